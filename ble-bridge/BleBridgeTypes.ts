/**
 * BLE Bridge Types - glove session surface
 */

import type { ReconnectSchedule, SessionState } from '../ble-management/types';
import type { CharacteristicKey } from '../glove-protocol/types';
import type { Clock } from '../shared/clock';

// Device found by discover(); passed back to connect()
export interface DeviceHandle {
  id: string;
  name: string;
  address: string;
  rssi: number;
}

// Snapshot of the live session
export interface DeviceSession {
  id: string | null;
  name: string | null;
  address: string | null;
  rssi: number | null;
  state: SessionState;
  characteristics: CharacteristicKey[];
  subscriptions: CharacteristicKey[];
  reconnectAttempts: number;
}

export interface GloveSessionOptions {
  scanTimeoutMs: number;
  connectTimeoutMs: number;
  channelCapacity: number;
  operationTimeoutMs: number;
  cancelGraceMs: number;
  reconnect: ReconnectSchedule;
  clock: Clock;
}

/**
 * Runs after an automatic or manual reconnect, before notifications resume.
 */
export type RestoreHook = () => Promise<void>;

export interface DiscoverOptions {
  timeoutMs?: number;
  /** Resolve as soon as this address is seen */
  address?: string;
}
