/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble behind the ITransport/IPeripheral/ICharacteristic interfaces.
 *
 * Loaded lazily by BleServiceFactory: requiring noble binds to the HCI adapter.
 */

import { EventEmitter } from 'events';
import noble = require('@abandonware/noble');
import type { Characteristic, Peripheral, Service } from '@abandonware/noble';
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
import { bleLogger } from '../BleLogger';
import { createLogger } from '../../shared/Logger';
import { describeError } from '../../shared/errors';

const log = createLogger('NobleTransport');

// ─────────────────────────────────────────────────────────────────────────────
// Noble Characteristic Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NobleCharacteristic extends EventEmitter implements ICharacteristic {
  readonly uuid: string;
  readonly properties: CharacteristicProperties;

  constructor(private nobleChar: Characteristic) {
    super();
    this.uuid = nobleChar.uuid;
    this.properties = {
      read: nobleChar.properties.includes('read'),
      write: nobleChar.properties.includes('write'),
      writeWithoutResponse: nobleChar.properties.includes('writeWithoutResponse'),
      notify: nobleChar.properties.includes('notify'),
      indicate: nobleChar.properties.includes('indicate'),
    };

    // Forward data events from native Noble characteristic
    this.nobleChar.on('data', (data: Buffer) => {
      this.emit('data', data);
    });
  }

  read(): Promise<Buffer> {
    return this.nobleChar.readAsync();
  }

  write(data: Buffer, withResponse: boolean): Promise<void> {
    // Noble takes withoutResponse
    return this.nobleChar.writeAsync(data, !withResponse);
  }

  subscribe(): Promise<void> {
    return this.nobleChar.subscribeAsync();
  }

  unsubscribe(): Promise<void> {
    return this.nobleChar.unsubscribeAsync();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Service Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NobleService implements IService {
  readonly uuid: string;

  constructor(private nobleService: Service) {
    this.uuid = nobleService.uuid;
  }

  async discoverCharacteristics(): Promise<ICharacteristic[]> {
    const characteristics = await this.nobleService.discoverCharacteristicsAsync([]);
    return characteristics.map(c => new NobleCharacteristic(c));
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Peripheral Adapter
// ─────────────────────────────────────────────────────────────────────────────

class NoblePeripheral extends EventEmitter implements IPeripheral {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  private _rssi: number;
  private connectionAttemptCount = 0;

  constructor(private noblePeripheral: Peripheral) {
    super();
    this.id = noblePeripheral.id;
    this.name = noblePeripheral.advertisement.localName || 'Unknown';
    this.address = noblePeripheral.address || noblePeripheral.id;
    this._rssi = noblePeripheral.rssi;

    // Forward disconnect events
    this.noblePeripheral.on('disconnect', () => {
      bleLogger.logPeripheralState(this.id, 'disconnected', { name: this.name });
      this.emit('disconnect');
    });

    this.noblePeripheral.on('rssiUpdate', (rssi: number) => {
      this._rssi = rssi;
      this.emit('rssiUpdate', rssi);
    });
  }

  get rssi(): number {
    return this._rssi;
  }

  get state(): PeripheralState {
    return this.noblePeripheral.state;
  }

  updateRssi(rssi: number): void {
    this._rssi = rssi;
  }

  async connect(): Promise<void> {
    const attemptNum = ++this.connectionAttemptCount;

    if (this.state === 'connected') {
      log.debug(`${this.name}: already connected, skipping`);
      return;
    }

    if (this.state !== 'disconnected') {
      log.warn(`${this.name}: unexpected state before connect: ${this.state}`);
    }

    bleLogger.logConnection(this.id, this.name, `connect attempt #${attemptNum}`);
    await this.noblePeripheral.connectAsync();
  }

  async disconnect(): Promise<void> {
    if (this.state === 'disconnected') return;
    await this.noblePeripheral.disconnectAsync();
  }

  async discoverServices(uuids: string[] = []): Promise<IService[]> {
    const services = await this.noblePeripheral.discoverServicesAsync(uuids);
    return services.map(s => new NobleService(s));
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport extends EventEmitter implements ITransport {
  private _isInitialized = false;
  private _isScanning = false;
  private discoveredPeripherals: Map<string, NoblePeripheral> = new Map();
  private config: TransportConfig;

  private readonly onStateChange = (state: string) => {
    bleLogger.logNobleEvent('stateChange', { state });
    if (state !== 'poweredOn' && this._isScanning) {
      this.stopScan().catch((error: unknown) => log.warn(`Error stopping scan: ${describeError(error)}`));
    }
  };

  private readonly onDiscover = (peripheral: Peripheral) => {
    this.handleDeviceDiscovered(peripheral);
  };

  private readonly onScanStop = () => {
    this._isScanning = false;
  };

  constructor(config?: Partial<TransportConfig>) {
    super();
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
    if (this._isInitialized) return true;

    try {
      log.info('Initializing...');

      noble.on('stateChange', this.onStateChange);
      noble.on('discover', this.onDiscover);
      noble.on('scanStop', this.onScanStop);

      await this.waitForBluetoothReady();

      this._isInitialized = true;
      log.info('✅ Initialized successfully');
      return true;
    } catch (error) {
      log.error(`Initialization failed: ${describeError(error)}`);
      this.removeNobleListeners();
      return false;
    }
  }

  async cleanup(): Promise<void> {
    log.info('Cleaning up...');

    if (this._isScanning) {
      await this.stopScan();
    }

    for (const peripheral of this.discoveredPeripherals.values()) {
      try {
        await peripheral.disconnect();
      } catch (error) {
        log.warn(`Error disconnecting ${peripheral.name}: ${describeError(error)}`);
      }
    }

    this.discoveredPeripherals.clear();
    this.removeNobleListeners();
    this._isInitialized = false;
  }

  async startScan(): Promise<void> {
    if (!this._isInitialized) {
      throw new Error('Transport not initialized');
    }

    if (this._isScanning) {
      log.debug('Already scanning');
      return;
    }

    log.info(`🔍 Starting scan for: ${this.config.deviceNamePatterns.join(', ')}`);
    this._isScanning = true;

    // Allow duplicates so RSSI stays fresh
    await noble.startScanningAsync([], true);
    this.emit('scanStarted');
  }

  async stopScan(): Promise<void> {
    if (!this._isScanning) return;

    try {
      await noble.stopScanningAsync();
    } catch (error) {
      log.warn(`Error stopping scan: ${describeError(error)}`);
    }

    this._isScanning = false;
    this.emit('scanStopped');
    log.info(`Scan stopped. Found ${this.discoveredPeripherals.size} devices`);
  }

  getDiscoveredDevices(): DiscoveredDevice[] {
    return Array.from(this.discoveredPeripherals.values()).map(p => ({
      id: p.id,
      name: p.name,
      address: p.address,
      rssi: p.rssi,
    }));
  }

  getPeripheral(deviceId: string): IPeripheral | null {
    return this.discoveredPeripherals.get(deviceId) ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private removeNobleListeners(): void {
    noble.removeListener('stateChange', this.onStateChange);
    noble.removeListener('discover', this.onDiscover);
    noble.removeListener('scanStop', this.onScanStop);
  }

  private handleDeviceDiscovered(noblePeripheral: Peripheral): void {
    const deviceName = noblePeripheral.advertisement.localName || '';

    if (!matchesTransportFilter(this.config, deviceName, noblePeripheral.rssi)) return;

    // Noble fires discover for every advertisement; only new devices are announced
    const existingPeripheral = this.discoveredPeripherals.get(noblePeripheral.id);
    if (existingPeripheral) {
      existingPeripheral.updateRssi(noblePeripheral.rssi);
      return;
    }

    log.info(`📡 Discovered: ${deviceName} (${noblePeripheral.id}, RSSI: ${noblePeripheral.rssi})`);

    const wrapped = new NoblePeripheral(noblePeripheral);
    this.discoveredPeripherals.set(noblePeripheral.id, wrapped);

    const device: DiscoveredDevice = {
      id: wrapped.id,
      name: wrapped.name,
      address: wrapped.address,
      rssi: wrapped.rssi,
    };
    this.emit('deviceDiscovered', device);
  }

  private waitForBluetoothReady(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (noble.state === 'poweredOn') {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        noble.removeListener('stateChange', stateChangeHandler);
        reject(new Error(`Bluetooth adapter timeout (${BLE_CONFIG.ADAPTER_READY_TIMEOUT / 1000}s)`));
      }, BLE_CONFIG.ADAPTER_READY_TIMEOUT);

      const stateChangeHandler = (state: string) => {
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          noble.removeListener('stateChange', stateChangeHandler);
          resolve();
        }
      };

      noble.on('stateChange', stateChangeHandler);
    });
  }
}
