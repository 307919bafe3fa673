/**
 * Mock Glove Transport
 * In-process simulated glove for development without an adapter, and for tests.
 *
 * The simulated device keeps a config register (reset on every link drop),
 * can coerce or reject config writes, refuse connects, drop the link and
 * push notifications on any characteristic.
 */

import { EventEmitter } from 'events';
import {
  ITransport,
  IPeripheral,
  IService,
  ICharacteristic,
  PeripheralState,
  DiscoveredDevice,
  TransportConfig,
  CharacteristicProperties,
  matchesTransportFilter,
} from '../interfaces/ITransport';
import { BLE_CONFIG } from '../BleBridgeConstants';
import { GLOVE_CHARACTERISTICS, GLOVE_SERVICES, type CharacteristicDefinition } from '../../glove-protocol/GattProfile';
import { DEFAULT_SENSOR_CONFIG, decodeConfig, encodeConfig } from '../../glove-protocol/ConfigCodec';
import {
  decodeTimestamp,
  encodeOverallStatus,
  encodeTelemetry,
  encodeText,
  encodeTimestamp,
} from '../../glove-protocol/CharacteristicCodec';
import {
  ChargingState,
  CommandState,
  ComponentState,
  type CharacteristicKey,
  type SensorConfig,
  type TelemetryKey,
} from '../../glove-protocol/types';
import { createLogger } from '../../shared/Logger';

const log = createLogger('MockGlove');

export interface SimulatedGloveOptions {
  id?: string;
  name?: string;
  address?: string;
  rssi?: number;
  firmwareRevision?: string;
  hardwareRevision?: string;
  modelNumber?: string;
  manufacturerName?: string;
  /** Device-side adjustment of a written config (the stored value is what reads back) */
  coerceConfig?: (requested: SensorConfig) => SensorConfig;
  /** Characteristics the firmware does not expose */
  omitCharacteristics?: CharacteristicKey[];
  connectDelayMs?: number;
  advertiseDelayMs?: number;
  /** Generate telemetry while the command state is RUN */
  streamTelemetry?: boolean;
  /** Seconds the device RTC runs ahead of what was written to it */
  clockSkewSeconds?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Simulated device
// ─────────────────────────────────────────────────────────────────────────────

export class SimulatedGlove {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  rssi: number;
  advertising = true;

  /** Reject config writes with a GATT error */
  rejectConfigWrites = false;
  /** Hold config writes this long before they reach the glove */
  configWriteDelayMs = 0;
  /** Number of upcoming connect() calls that fail */
  failNextConnects = 0;

  readonly characteristics = new Map<CharacteristicKey, MockCharacteristic>();
  readonly writes: Array<{ key: CharacteristicKey; data: Buffer }> = [];

  private registers = new Map<CharacteristicKey, Buffer>();
  private streamTimer: NodeJS.Timeout | null = null;
  private streamTick = 0;

  constructor(readonly options: SimulatedGloveOptions = {}) {
    this.id = options.id ?? 'mock-glove-01';
    this.name = options.name ?? 'VR-Glove-01';
    this.address = options.address ?? 'aa:bb:cc:dd:ee:01';
    this.rssi = options.rssi ?? -50;

    const omitted = new Set(options.omitCharacteristics ?? []);
    for (const def of GLOVE_CHARACTERISTICS) {
      if (!omitted.has(def.key)) {
        this.characteristics.set(def.key, new MockCharacteristic(this, def));
      }
    }

    this.resetRegisters();
  }

  /** Power-on register contents; the glove keeps nothing across a link reset */
  resetRegisters(): void {
    this.stopStreaming();
    const opts = this.options;
    this.registers = new Map<CharacteristicKey, Buffer>([
      ['config', encodeConfig(DEFAULT_SENSOR_CONFIG)],
      ['timestamp', encodeTimestamp(0)],
      ['batteryLevel', Buffer.from([80])],
      ['batteryCharging', Buffer.from([ChargingState.NOT_CHARGING])],
      [
        'overallStatus',
        encodeOverallStatus({
          errorCode: 0,
          fuelGauge: ComponentState.RUNNING,
          imu1: ComponentState.IDLE,
          imu2: ComponentState.IDLE,
        }),
      ],
      ['firmwareRevision', encodeText(opts.firmwareRevision ?? '1.2.0')],
      ['hardwareRevision', encodeText(opts.hardwareRevision ?? 'rev-B')],
      ['modelNumber', encodeText(opts.modelNumber ?? 'VRG-2')],
      ['manufacturerName', encodeText(opts.manufacturerName ?? 'Glove Labs')],
    ]);
  }

  getConfig(): SensorConfig {
    return decodeConfig(this.readRegister('config'));
  }

  readRegister(key: CharacteristicKey): Buffer {
    return Buffer.from(this.registers.get(key) ?? Buffer.alloc(0));
  }

  writeRegister(key: CharacteristicKey, data: Buffer): void {
    this.writes.push({ key, data: Buffer.from(data) });

    if (key === 'config') {
      if (this.rejectConfigWrites) {
        throw new Error('GATT write rejected (0x80 application error)');
      }
      const requested = decodeConfig(data);
      const stored = this.options.coerceConfig?.(requested) ?? requested;
      this.registers.set('config', encodeConfig(stored));
      this.applyCommand(stored);
      return;
    }

    if (key === 'timestamp') {
      const written = decodeTimestamp(data);
      this.registers.set(key, encodeTimestamp(written + (this.options.clockSkewSeconds ?? 0)));
      return;
    }

    this.registers.set(key, Buffer.from(data));
  }

  /**
   * Push a notification on a characteristic (delivered only while subscribed).
   */
  notify(key: CharacteristicKey, payload: Buffer): boolean {
    const characteristic = this.characteristics.get(key);
    if (!characteristic) return false;
    return characteristic.deliver(payload);
  }

  notifyValues(key: TelemetryKey, values: number[], sequence: number | null = null): boolean {
    return this.notify(key, encodeTelemetry(key, { values, timestamp: { hostMs: 0, sequence } }));
  }

  clearSubscriptions(): void {
    this.characteristics.forEach(c => c.clearSubscription());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Telemetry generator
  // ─────────────────────────────────────────────────────────────────────────

  private applyCommand(config: SensorConfig): void {
    if (!this.options.streamTelemetry) return;

    if (config.command === CommandState.RUN) {
      this.startStreaming(config.updateIntervalMs);
    } else {
      this.stopStreaming();
    }
  }

  private startStreaming(intervalMs: number): void {
    this.stopStreaming();
    log.info(`🧪 Streaming simulated telemetry every ${intervalMs}ms`);

    this.streamTimer = setInterval(() => {
      const t = ++this.streamTick;
      const wobble = Math.round(Math.sin(t / 10) * 20);
      const sequence = t & 0xffff;

      this.notifyValues('imu1Raw', [wobble, -wobble, 1000, 0.01, -0.02, 0, 30, -12, 41], sequence);
      this.notifyValues('imu2Raw', [-wobble, wobble, 998, -0.01, 0.02, 0, 28, -10, 40], sequence);
      this.notifyValues('joystick', [wobble * 3, 0, 0]);
      this.notifyValues('buttons', [0, 0, t % 50 === 0 ? 1 : 0, 0]);
      this.notifyValues('force', [12.5 + wobble / 10]);
      this.notifyValues('flex', [20, 21, 22, 23, 24]);
    }, intervalMs);
  }

  stopStreaming(): void {
    if (this.streamTimer) {
      clearInterval(this.streamTimer);
      this.streamTimer = null;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// GATT adapters over the simulated device
// ─────────────────────────────────────────────────────────────────────────────

class MockCharacteristic extends EventEmitter implements ICharacteristic {
  readonly uuid: string;
  readonly properties: CharacteristicProperties;
  private subscribed = false;

  constructor(
    private readonly glove: SimulatedGlove,
    readonly definition: CharacteristicDefinition
  ) {
    super();
    this.uuid = definition.uuid;
    this.properties = {
      read: true,
      write: definition.write,
      writeWithoutResponse: false,
      notify: definition.notify,
      indicate: false,
    };
  }

  async read(): Promise<Buffer> {
    return this.glove.readRegister(this.definition.key);
  }

  async write(data: Buffer, _withResponse: boolean): Promise<void> {
    if (!this.definition.write) {
      throw new Error(`Characteristic ${this.definition.key} is not writable`);
    }
    const delayMs = this.definition.key === 'config' ? this.glove.configWriteDelayMs : 0;
    if (delayMs > 0) await new Promise(resolve => setTimeout(resolve, delayMs));
    this.glove.writeRegister(this.definition.key, data);
  }

  async subscribe(): Promise<void> {
    if (!this.definition.notify) {
      throw new Error(`Characteristic ${this.definition.key} does not notify`);
    }
    this.subscribed = true;
  }

  async unsubscribe(): Promise<void> {
    this.subscribed = false;
  }

  deliver(payload: Buffer): boolean {
    if (!this.subscribed) return false;
    this.emit('data', payload);
    return true;
  }

  clearSubscription(): void {
    this.subscribed = false;
  }
}

class MockService implements IService {
  constructor(
    readonly uuid: string,
    private readonly characteristics: MockCharacteristic[]
  ) {}

  async discoverCharacteristics(): Promise<ICharacteristic[]> {
    return [...this.characteristics];
  }
}

class MockPeripheral extends EventEmitter implements IPeripheral {
  private _state: PeripheralState = 'disconnected';

  constructor(private readonly glove: SimulatedGlove) {
    super();
  }

  get id(): string {
    return this.glove.id;
  }

  get name(): string {
    return this.glove.name;
  }

  get address(): string {
    return this.glove.address;
  }

  get rssi(): number {
    return this.glove.rssi;
  }

  get state(): PeripheralState {
    return this._state;
  }

  async connect(): Promise<void> {
    if (this._state === 'connected') return;
    this._state = 'connecting';

    const delayMs = this.glove.options.connectDelayMs ?? 0;
    if (delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }

    if (this.glove.failNextConnects > 0) {
      this.glove.failNextConnects--;
      this._state = 'disconnected';
      throw new Error('Peripheral not reachable');
    }

    this._state = 'connected';
  }

  async disconnect(): Promise<void> {
    if (this._state === 'disconnected') return;
    this.dropLink();
  }

  async discoverServices(uuids: string[] = []): Promise<IService[]> {
    if (this._state !== 'connected') {
      throw new Error('Peripheral not connected');
    }

    const byService = new Map<string, MockCharacteristic[]>();
    for (const characteristic of this.glove.characteristics.values()) {
      const serviceUuid = GLOVE_SERVICES[characteristic.definition.service];
      const list = byService.get(serviceUuid) ?? [];
      list.push(characteristic);
      byService.set(serviceUuid, list);
    }

    return Array.from(byService.entries())
      .filter(([uuid]) => uuids.length === 0 || uuids.includes(uuid))
      .map(([uuid, characteristics]) => new MockService(uuid, characteristics));
  }

  /**
   * Link reset: subscriptions and device registers are lost.
   */
  dropLink(): void {
    if (this._state === 'disconnected') return;
    this._state = 'disconnected';
    this.glove.clearSubscriptions();
    this.glove.resetRegisters();
    this.emit('disconnect');
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Transport
// ─────────────────────────────────────────────────────────────────────────────

export class MockGloveTransport extends EventEmitter implements ITransport {
  readonly glove: SimulatedGlove;
  private readonly peripheral: MockPeripheral;
  private _isInitialized = false;
  private _isScanning = false;
  private discovered = false;
  private advertiseTimer: NodeJS.Timeout | null = null;
  private config: TransportConfig;

  constructor(options: SimulatedGloveOptions = {}, config?: Partial<TransportConfig>) {
    super();
    this.glove = new SimulatedGlove(options);
    this.peripheral = new MockPeripheral(this.glove);
    this.config = {
      deviceNamePatterns: config?.deviceNamePatterns ?? [...BLE_CONFIG.DEVICE_PATTERNS],
      minRssi: config?.minRssi ?? BLE_CONFIG.MIN_RSSI,
    };
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  get isScanning(): boolean {
    return this._isScanning;
  }

  async initialize(): Promise<boolean> {
    log.info('🧪 Mock glove transport initialized (no adapter required)');
    this._isInitialized = true;
    return true;
  }

  async cleanup(): Promise<void> {
    await this.stopScan();
    this.peripheral.dropLink();
    this.glove.stopStreaming();
    this._isInitialized = false;
  }

  async startScan(): Promise<void> {
    if (!this._isInitialized) {
      throw new Error('Transport not initialized');
    }
    if (this._isScanning) return;

    this._isScanning = true;
    this.emit('scanStarted');

    this.advertiseTimer = setTimeout(() => {
      this.advertiseTimer = null;
      this.advertise();
    }, this.glove.options.advertiseDelayMs ?? 0);
  }

  async stopScan(): Promise<void> {
    if (this.advertiseTimer) {
      clearTimeout(this.advertiseTimer);
      this.advertiseTimer = null;
    }
    if (!this._isScanning) return;

    this._isScanning = false;
    this.emit('scanStopped');
  }

  getDiscoveredDevices(): DiscoveredDevice[] {
    return this.discovered ? [this.describe()] : [];
  }

  getPeripheral(deviceId: string): IPeripheral | null {
    return this.discovered && deviceId === this.glove.id ? this.peripheral : null;
  }

  /**
   * Drop the link as if the glove went out of range.
   */
  simulateLinkLoss(): void {
    log.info('🧪 Simulating link loss');
    this.peripheral.dropLink();
  }

  private describe(): DiscoveredDevice {
    return {
      id: this.glove.id,
      name: this.glove.name,
      address: this.glove.address,
      rssi: this.glove.rssi,
    };
  }

  private advertise(): void {
    if (!this._isScanning || !this.glove.advertising) return;
    if (!matchesTransportFilter(this.config, this.glove.name, this.glove.rssi)) return;

    // Like noble's cache: only a glove not seen before is announced
    const known = this.discovered;
    this.discovered = true;
    if (!known) this.emit('deviceDiscovered', this.describe());
  }
}
