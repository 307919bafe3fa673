/**
 * BLE Bridge - glove transport session
 *
 * Public API for discovering, connecting to and streaming from one glove
 */

// ─────────────────────────────────────────────────────────────────────────────
// Session (main export)
// ─────────────────────────────────────────────────────────────────────────────

export { GloveSession } from './GloveSession';

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export { createTransport, createGloveSession } from './BleServiceFactory';
export type { TransportKind, TransportFactoryOptions } from './BleServiceFactory';

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ITransport,
  IPeripheral,
  IService,
  ICharacteristic,
  PeripheralState,
  DiscoveredDevice,
  TransportConfig,
} from './interfaces/ITransport';

// ─────────────────────────────────────────────────────────────────────────────
// Transports
// NobleTransport is not re-exported: importing it binds to the adapter
// ─────────────────────────────────────────────────────────────────────────────

export { MockGloveTransport, SimulatedGlove } from './transports/MockGloveTransport';
export type { SimulatedGloveOptions } from './transports/MockGloveTransport';

// ─────────────────────────────────────────────────────────────────────────────
// Building blocks
// ─────────────────────────────────────────────────────────────────────────────

export { NotificationChannel } from './NotificationChannel';
export type { RawNotification, ChannelStats } from './NotificationChannel';
export { GattOperationQueue } from './GattOperationQueue';

// ─────────────────────────────────────────────────────────────────────────────
// Type definitions
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DeviceHandle,
  DeviceSession,
  GloveSessionOptions,
  RestoreHook,
  DiscoverOptions,
} from './BleBridgeTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export { BLE_CONFIG, GATT_CONFIG, CHANNEL_CONFIG } from './BleBridgeConstants';
