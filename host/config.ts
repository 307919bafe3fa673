/**
 * Host configuration
 * Typed GloveConfig built from GLOVE_* environment variables over defaults.
 * Values that do not parse fall back to the default with a warning.
 */

import * as os from 'os';
import * as path from 'path';
import type { LevelOption } from 'electron-log';
import { BLE_CONFIG, CHANNEL_CONFIG } from '../ble-bridge/BleBridgeConstants';
import type { TransportKind } from '../ble-bridge/BleServiceFactory';
import { SESSION_CONFIG, type ReconnectSchedule } from '../ble-management/types';
import { ROUTER_CONFIG } from '../telemetry/TelemetryRouter';
import { createLogger } from '../shared/Logger';

const log = createLogger('Config');

export interface GloveConfig {
  transport: TransportKind;
  deviceNamePatterns: string[];
  minRssi: number;
  /** Connect to this address without picking from a scan */
  deviceAddress: string | null;
  scanTimeoutMs: number;
  connectTimeoutMs: number;
  reconnect: ReconnectSchedule;
  channelCapacity: number;
  subscriberCapacity: number;
  logDirectory: string;
  calibrationStorePath: string;
  display: { enabled: boolean; host: string; port: number };
  logLevel: LevelOption;
  appLogPath: string | null;
}

const DATA_DIR = path.join(os.homedir(), '.vr-glove');

export const DEFAULT_CONFIG: GloveConfig = {
  transport: 'noble',
  deviceNamePatterns: [...BLE_CONFIG.DEVICE_PATTERNS],
  minRssi: BLE_CONFIG.MIN_RSSI,
  deviceAddress: null,
  scanTimeoutMs: BLE_CONFIG.SCAN_TIMEOUT,
  connectTimeoutMs: BLE_CONFIG.CONNECTION_TIMEOUT,
  reconnect: { ...SESSION_CONFIG.reconnect },
  channelCapacity: CHANNEL_CONFIG.CAPACITY,
  subscriberCapacity: ROUTER_CONFIG.DEFAULT_CAPACITY,
  logDirectory: path.join(DATA_DIR, 'logs'),
  calibrationStorePath: path.join(DATA_DIR, 'calibration.json'),
  display: { enabled: true, host: '127.0.0.1', port: 8765 },
  logLevel: 'info',
  appLogPath: null,
};

const TRANSPORTS: readonly TransportKind[] = ['noble', 'mock'];
const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  check: (value: number) => boolean = value => value >= 0
): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    log.warn(`⚠️ ${name}="${raw}" is not valid; using ${fallback}`);
    return fallback;
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const match = choices.find(choice => choice === raw.toLowerCase());
  if (!match) {
    log.warn(`⚠️ ${name}="${raw}" is not one of ${choices.join(', ')}; using ${fallback}`);
    return fallback;
  }
  return match;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  log.warn(`⚠️ ${name}="${raw}" is not a flag; using ${fallback}`);
  return fallback;
}

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

/**
 * Build the host config from the environment (dotenv already applied by the entry point).
 */
export function loadConfig(env: Env = process.env): GloveConfig {
  const defaults = DEFAULT_CONFIG;
  const patterns = readString(env, 'GLOVE_NAME_PATTERNS');
  const logLevel = readChoice(env, 'GLOVE_LOG_LEVEL', LOG_LEVELS, 'info');

  return {
    transport: readChoice(env, 'GLOVE_TRANSPORT', TRANSPORTS, defaults.transport),
    deviceNamePatterns: patterns
      ? patterns.split(',').map(pattern => pattern.trim()).filter(Boolean)
      : [...defaults.deviceNamePatterns],
    minRssi: readNumber(env, 'GLOVE_MIN_RSSI', defaults.minRssi, value => value <= 0),
    deviceAddress: readString(env, 'GLOVE_ADDRESS')?.toLowerCase() ?? null,
    scanTimeoutMs: readNumber(env, 'GLOVE_SCAN_TIMEOUT_MS', defaults.scanTimeoutMs, isPositiveInteger),
    connectTimeoutMs: readNumber(env, 'GLOVE_CONNECT_TIMEOUT_MS', defaults.connectTimeoutMs, isPositiveInteger),
    reconnect: {
      ...defaults.reconnect,
      baseDelayMs: readNumber(env, 'GLOVE_RECONNECT_DELAY_MS', defaults.reconnect.baseDelayMs, isPositiveInteger),
      maxDelayMs: readNumber(env, 'GLOVE_RECONNECT_DELAY_MS', defaults.reconnect.maxDelayMs, isPositiveInteger),
      maxAttempts: readNumber(env, 'GLOVE_RECONNECT_ATTEMPTS', defaults.reconnect.maxAttempts, isPositiveInteger),
    },
    channelCapacity: readNumber(env, 'GLOVE_CHANNEL_CAPACITY', defaults.channelCapacity, isPositiveInteger),
    subscriberCapacity: readNumber(env, 'GLOVE_SUBSCRIBER_CAPACITY', defaults.subscriberCapacity, isPositiveInteger),
    logDirectory: readString(env, 'GLOVE_LOG_DIR') ?? defaults.logDirectory,
    calibrationStorePath: readString(env, 'GLOVE_CALIBRATION_FILE') ?? defaults.calibrationStorePath,
    display: {
      enabled: readFlag(env, 'GLOVE_DISPLAY', defaults.display.enabled),
      host: readString(env, 'GLOVE_DISPLAY_HOST') ?? defaults.display.host,
      port: readNumber(env, 'GLOVE_DISPLAY_PORT', defaults.display.port, value => Number.isInteger(value) && value < 65536),
    },
    logLevel,
    appLogPath: readString(env, 'GLOVE_APP_LOG') ?? null,
  };
}
