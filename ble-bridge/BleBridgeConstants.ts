/**
 * BLE Bridge Constants - glove transport defaults
 */

export const BLE_CONFIG = {
  // Device identification
  DEVICE_PATTERNS: ['vr-glove', 'vrglove'],

  // Discovery must finish under 3s; most devices advertise every 100-500ms
  SCAN_TIMEOUT: 2500,
  // Connect + service discovery
  CONNECTION_TIMEOUT: 10000,

  // -90 dBm keeps a glove on the far side of a room
  MIN_RSSI: -90,

  // Adapter must report poweredOn within this window
  ADAPTER_READY_TIMEOUT: 15000,
} as const;

export const GATT_CONFIG = {
  // Per-operation timeout for queued reads/writes/subscribes
  OPERATION_TIMEOUT: 3000,
  // Subscribe retries (notify enable occasionally fails right after connect)
  SUBSCRIBE_RETRIES: 5,
  SUBSCRIBE_RETRY_DELAY: 200,
} as const;

export const CHANNEL_CONFIG = {
  // Raw notifications buffered between the receive path and the router
  CAPACITY: 1024,
} as const;
