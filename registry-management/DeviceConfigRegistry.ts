/**
 * Device/Config Registry
 *
 * Holds the glove's last acknowledged SensorConfig and its device metadata.
 * Config writes go through here: validated and encoded before any write,
 * at most one in flight per characteristic, committed only from the read-back.
 *
 * Events (onChange): every committed config or metadata update.
 */

import type { RawNotification } from '../ble-bridge/NotificationChannel';
import type { DeviceHandle } from '../ble-bridge/BleBridgeTypes';
import {
  DEFAULT_SENSOR_CONFIG,
  configsEqual,
  decodeConfig,
  encodeConfig,
  mergeConfig,
} from '../glove-protocol/ConfigCodec';
import { decodeBatteryCharging, decodeOverallStatus, decodeText } from '../glove-protocol/CharacteristicCodec';
import type {
  CharacteristicKey,
  ChargingState,
  DeviceInfo,
  MetadataKey,
  OverallStatus,
  SensorConfig,
  SensorConfigChange,
  SensorFrame,
} from '../glove-protocol/types';
import { DeviceBusyError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';

const log = createLogger('DeviceConfigRegistry');

/**
 * The slice of the transport session the registry drives (GloveSession satisfies it).
 */
export interface ConfigTarget {
  read(key: CharacteristicKey): Promise<Buffer>;
  writeConfig(key: CharacteristicKey, data: Buffer): Promise<Buffer>;
  hasCharacteristic(key: CharacteristicKey): boolean;
  getDevice(): DeviceHandle | null;
}

export interface RegistrySnapshot {
  config: SensorConfig | null;
  device: DeviceInfo | null;
}

type RegistryChangeHandler = (snapshot: RegistrySnapshot) => void;

type MutableDeviceInfo = { -readonly [K in keyof DeviceInfo]: DeviceInfo[K] };

const INFO_KEYS = ['firmwareRevision', 'hardwareRevision', 'modelNumber', 'manufacturerName'] as const;

function emptyInfo(device: DeviceHandle | null): MutableDeviceInfo {
  return {
    address: device?.address ?? 'unknown',
    name: device?.name ?? 'unknown',
    firmwareRevision: null,
    hardwareRevision: null,
    modelNumber: null,
    manufacturerName: null,
    batteryLevel: null,
    charging: null,
    status: null,
  };
}

export class DeviceConfigRegistry {
  private config: SensorConfig | null = null;
  private info: MutableDeviceInfo | null = null;
  private inFlight = new Set<CharacteristicKey>();
  private changeHandlers = new Set<RegistryChangeHandler>();

  constructor(private readonly target: ConfigTarget) {}

  // ───────────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────────

  /** Last acknowledged config (frozen), or null before the first read */
  getConfig(): SensorConfig | null {
    return this.config;
  }

  getDeviceInfo(): DeviceInfo | null {
    if (!this.info) return null;
    return Object.freeze({ ...this.info });
  }

  getSnapshot(): RegistrySnapshot {
    return { config: this.getConfig(), device: this.getDeviceInfo() };
  }

  isWriteInFlight(key: CharacteristicKey = 'config'): boolean {
    return this.inFlight.has(key);
  }

  onChange(handler: RegistryChangeHandler): () => void {
    this.changeHandlers.add(handler);
    return () => this.changeHandlers.delete(handler);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Device reads
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Read config and device information after connect.
   */
  async refresh(): Promise<RegistrySnapshot> {
    const info = emptyInfo(this.target.getDevice());

    this.commitConfig(decodeConfig(await this.target.read('config')));

    for (const key of INFO_KEYS) {
      info[key] = await this.readOptional(key, payload => decodeText(payload));
    }
    info.batteryLevel = await this.readOptional('batteryLevel', payload => payload.readUInt8(0));
    info.charging = await this.readOptional('batteryCharging', decodeBatteryCharging);
    info.status = await this.readOptional('overallStatus', decodeOverallStatus);

    this.info = info;
    log.info(`📋 ${info.name} fw=${info.firmwareRevision ?? '?'} model=${info.modelNumber ?? '?'}`);
    this.notifyChanges();
    return this.getSnapshot();
  }

  private async readOptional<T>(key: MetadataKey | 'batteryLevel', decode: (payload: Buffer) => T): Promise<T | null> {
    if (!this.target.hasCharacteristic(key)) return null;

    try {
      return decode(await this.target.read(key));
    } catch (error) {
      log.warn(`Reading ${key} failed: ${describeError(error)}`);
      return null;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Config writes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Apply a partial change over the last acknowledged config.
   * @returns the config the device acknowledged (may differ from the request if the device coerced it)
   * @throws InvalidConfigError before any write, DeviceBusyError, WriteRejectedError
   */
  async requestConfig(change: SensorConfigChange): Promise<SensorConfig> {
    const requested = mergeConfig(this.config ?? DEFAULT_SENSOR_CONFIG, change);
    const bytes = encodeConfig(requested);

    const acknowledged = await this.writeAndCommit(bytes);
    if (!configsEqual(acknowledged, requested)) {
      log.warn('⚠️ Device adjusted the requested config; recording the acknowledged value');
    }
    return acknowledged;
  }

  /**
   * Restore hook: re-apply the last acknowledged config after a reconnect.
   */
  async reapply(): Promise<void> {
    const config = this.config;
    if (!config) return;

    log.info('🔁 Re-applying last acknowledged config');
    await this.writeAndCommit(encodeConfig(config));
  }

  private async writeAndCommit(bytes: Buffer): Promise<SensorConfig> {
    if (this.inFlight.has('config')) {
      throw new DeviceBusyError('config');
    }

    this.inFlight.add('config');
    try {
      const ack = await this.target.writeConfig('config', bytes);
      const acknowledged = decodeConfig(ack);
      this.commitConfig(acknowledged);
      return acknowledged;
    } finally {
      this.inFlight.delete('config');
    }
  }

  private commitConfig(config: SensorConfig): void {
    this.config = config;
    this.notifyChanges();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Live metadata
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Battery level frames from the router.
   */
  observeFrame(frame: SensorFrame): void {
    if (frame.source !== 'battery' || !frame.valid) return;
    this.updateInfo({ batteryLevel: frame.values[0] });
  }

  /**
   * Charging/status notifications straight from the session channel.
   */
  handleNotification(notification: RawNotification): void {
    try {
      if (notification.key === 'batteryCharging') {
        const charging: ChargingState = decodeBatteryCharging(notification.payload);
        this.updateInfo({ charging });
      } else if (notification.key === 'overallStatus') {
        const status: OverallStatus = decodeOverallStatus(notification.payload);
        if (status.errorCode !== 0) {
          log.warn(`⚠️ Glove reports error code ${status.errorCode}`);
        }
        this.updateInfo({ status });
      }
    } catch (error) {
      log.warn(`Dropping ${notification.key} notification: ${describeError(error)}`);
    }
  }

  /**
   * Consume a metadata channel until it closes.
   */
  async pump(channel: AsyncIterable<RawNotification>): Promise<void> {
    for await (const notification of channel) {
      this.handleNotification(notification);
    }
  }

  private updateInfo(update: Partial<MutableDeviceInfo>): void {
    this.info = { ...(this.info ?? emptyInfo(this.target.getDevice())), ...update };
    this.notifyChanges();
  }

  clear(): void {
    this.config = null;
    this.info = null;
    this.notifyChanges();
  }

  private notifyChanges(): void {
    const snapshot = this.getSnapshot();
    this.changeHandlers.forEach(handler => {
      try {
        handler(snapshot);
      } catch (error) {
        log.error(`Change handler failed: ${describeError(error)}`);
      }
    });
  }
}
