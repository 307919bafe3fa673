/**
 * BLE Transport Interface
 * Platform-agnostic abstraction for BLE operations
 */

import { EventEmitter } from 'events';

// ─────────────────────────────────────────────────────────────────────────────
// Characteristic Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface CharacteristicProperties {
  read: boolean;
  write: boolean;
  writeWithoutResponse: boolean;
  notify: boolean;
  indicate: boolean;
}

export interface ICharacteristic extends EventEmitter {
  readonly uuid: string;
  readonly properties: CharacteristicProperties;

  read(): Promise<Buffer>;
  write(data: Buffer, withResponse: boolean): Promise<void>;
  subscribe(): Promise<void>;
  unsubscribe(): Promise<void>;

  // Events: 'data' (Buffer)
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface IService {
  readonly uuid: string;

  discoverCharacteristics(): Promise<ICharacteristic[]>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Peripheral Interface
// ─────────────────────────────────────────────────────────────────────────────

export type PeripheralState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting' | 'error';

export interface IPeripheral extends EventEmitter {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly rssi: number;
  readonly state: PeripheralState;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Empty list discovers every service */
  discoverServices(uuids?: string[]): Promise<IService[]>;

  // Events: 'disconnect', 'rssiUpdate'
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovered Device Info
// ─────────────────────────────────────────────────────────────────────────────

export interface DiscoveredDevice {
  id: string;
  name: string;
  address: string;
  rssi: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface TransportConfig {
  deviceNamePatterns: string[];
  minRssi: number;
}

export interface ITransport extends EventEmitter {
  readonly isInitialized: boolean;
  readonly isScanning: boolean;

  // Lifecycle
  initialize(): Promise<boolean>;
  cleanup(): Promise<void>;

  // Scanning
  startScan(): Promise<void>;
  stopScan(): Promise<void>;

  // Device access
  getDiscoveredDevices(): DiscoveredDevice[];
  getPeripheral(deviceId: string): IPeripheral | null;

  // Events:
  // 'deviceDiscovered' (DiscoveredDevice)
  // 'scanStarted'
  // 'scanStopped'
  // 'error' (Error)
}

/**
 * Shared advertisement filter: name pattern (case-insensitive substring) and RSSI floor.
 */
export function matchesTransportFilter(config: TransportConfig, name: string, rssi: number): boolean {
  const nameLower = name.toLowerCase();
  const isTargetDevice = config.deviceNamePatterns.some(pattern => nameLower.includes(pattern.toLowerCase()));
  return isTargetDevice && rssi >= config.minRssi;
}
