import type { SessionState } from '../../ble-management/types';
import type { DeviceInfo, SensorConfig, SensorSource } from '../../glove-protocol/types';

// Message type constants for the display WebSocket
export const MESSAGE_TYPES = {
  // System messages (0x01-0x0F)
  HEARTBEAT: 0x01,
  ERROR: 0x02,

  // Streaming data (0x30-0x3F, fire-and-forget)
  SENSOR_BATCH: 0x30,
  DEVICE_STATUS: 0x31,

  // Internal protocol (0xF0-0xFF)
  PING: 0xF1,
  PONG: 0xF2,
} as const;

export type MessageType = typeof MESSAGE_TYPES[keyof typeof MESSAGE_TYPES];

export interface DisplayFrame {
  source: SensorSource;
  hostMs: number;
  sequence: number | null;
  values: readonly number[];
  units: readonly string[];
  valid: boolean;
  calibrated: boolean;
}

export interface DisplayStatus {
  connectionState: SessionState;
  device: DeviceInfo | null;
  config: SensorConfig | null;
  logging: boolean;
  droppedFrames: number;
}

export interface SensorBatchMessage {
  type: typeof MESSAGE_TYPES.SENSOR_BATCH;
  timestamp: number;
  frames: DisplayFrame[];
}

export interface DeviceStatusMessage {
  type: typeof MESSAGE_TYPES.DEVICE_STATUS;
  timestamp: number;
  status: DisplayStatus;
}

export interface ControlMessage {
  type: typeof MESSAGE_TYPES.HEARTBEAT | typeof MESSAGE_TYPES.PING | typeof MESSAGE_TYPES.PONG;
  timestamp: number;
}

export interface ErrorMessage {
  type: typeof MESSAGE_TYPES.ERROR;
  timestamp: number;
  error: string;
}

export type DisplayMessage = SensorBatchMessage | DeviceStatusMessage | ControlMessage | ErrorMessage;
