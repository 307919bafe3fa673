/**
 * Calibration Store
 * JSON file keyed by device address → source → profile; replaced atomically on save.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SENSOR_SOURCES, type SensorSource } from '../glove-protocol/types';
import { describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import type { CalibrationOrigin, CalibrationProfile, CalibrationProfiles } from './types';

const log = createLogger('CalibrationStore');

const STORE_VERSION = 1;

interface StoreFile {
  version: number;
  devices: Record<string, CalibrationProfiles>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation of persisted JSON
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number' && Number.isFinite(v));
}

function toSource(value: string): SensorSource | undefined {
  return SENSOR_SOURCES.find(source => source === value);
}

function toOrigin(value: unknown): CalibrationOrigin | undefined {
  return value === 'zero' || value === 'oracle' ? value : undefined;
}

function parseProfile(source: SensorSource, value: unknown): CalibrationProfile | null {
  if (!isRecord(value)) return null;

  const { offset, scale, drift, driftExceeded, sampleCount, calibratedAt } = value;
  const origin = toOrigin(value.origin);
  if (!isNumberArray(offset) || !isNumberArray(scale) || offset.length !== scale.length) return null;
  if (drift !== null && !isNumberArray(drift)) return null;
  if (typeof sampleCount !== 'number' || typeof calibratedAt !== 'string' || !origin) return null;

  return Object.freeze({
    source,
    offset: Object.freeze([...offset]),
    scale: Object.freeze([...scale]),
    drift: drift === null ? null : Object.freeze([...drift]),
    driftExceeded: driftExceeded === true,
    sampleCount,
    calibratedAt,
    origin,
  });
}

function parseProfiles(value: unknown): CalibrationProfiles {
  const profiles: CalibrationProfiles = {};
  if (!isRecord(value)) return profiles;

  for (const [key, entry] of Object.entries(value)) {
    const source = toSource(key);
    const profile = source ? parseProfile(source, entry) : null;
    if (source && profile) {
      profiles[source] = profile;
    } else {
      log.warn(`Skipping malformed calibration entry "${key}"`);
    }
  }
  return profiles;
}

function parseStore(text: string): StoreFile {
  const parsed: unknown = JSON.parse(text);
  const devices: Record<string, CalibrationProfiles> = {};

  if (isRecord(parsed) && isRecord(parsed.devices)) {
    for (const [address, profiles] of Object.entries(parsed.devices)) {
      devices[address] = parseProfiles(profiles);
    }
  }
  return { version: STORE_VERSION, devices };
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export class CalibrationStore {
  // Saves are chained so two writers never interleave read-modify-write
  private saveChain: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Profiles for one device; empty when the file or device entry is missing.
   */
  async load(deviceKey: string): Promise<CalibrationProfiles> {
    const store = await this.readStore();
    return store.devices[normalizeKey(deviceKey)] ?? {};
  }

  /**
   * Replace one device's profiles, leaving other devices untouched.
   */
  save(deviceKey: string, profiles: CalibrationProfiles): Promise<void> {
    const run = this.saveChain.then(() => this.writeDevice(normalizeKey(deviceKey), profiles));
    this.saveChain = run.catch((error: unknown) => {
      log.error(`Calibration save failed: ${describeError(error)}`);
    });
    return run;
  }

  private async writeDevice(deviceKey: string, profiles: CalibrationProfiles): Promise<void> {
    const store = await this.readStore();
    store.devices[deviceKey] = profiles;

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tempPath, JSON.stringify(store, null, 2), 'utf-8');
    await fs.promises.rename(tempPath, this.filePath);

    log.info(`💾 Saved ${Object.keys(profiles).length} calibration profile(s) for ${deviceKey}`);
  }

  private async readStore(): Promise<StoreFile> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return { version: STORE_VERSION, devices: {} };
      throw error;
    }

    try {
      return parseStore(text);
    } catch (error) {
      log.warn(`Calibration store ${this.filePath} is unreadable, starting empty: ${describeError(error)}`);
      return { version: STORE_VERSION, devices: {} };
    }
  }
}

function normalizeKey(deviceKey: string): string {
  return deviceKey.toLowerCase();
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
