/**
 * Time sync & IMU alignment types
 */

import type { CharacteristicKey } from '../glove-protocol/types';

// Host wall clock in ms since the Unix epoch
export type WallClock = () => number;

/**
 * The slice of the transport session clock sync drives (GloveSession satisfies it).
 */
export interface ClockSyncTarget {
  read(key: CharacteristicKey): Promise<Buffer>;
  writeConfig(key: CharacteristicKey, data: Buffer): Promise<Buffer>;
  hasCharacteristic(key: CharacteristicKey): boolean;
}

export interface TimeSyncSample {
  T1: number; // host ms before the read
  T4: number; // host ms after the read
  deviceMs: number;
  RTT: number;
  offset: number; // deviceMs - host midpoint
}

export interface ClockSyncResult {
  writtenSeconds: number;
  readBackSeconds: number;
  /** Device clock minus host clock, seconds (positive: device ahead) */
  offsetSeconds: number;
  avgRttMs: number;
  sampleCount: number;
  inSync: boolean;
  syncedAt: string;
}

export interface AlignmentStats {
  pairs: number;
  unpaired: number;
  exceeded: number;
  lastSkewMs: number | null;
  meanSkewMs: number | null;
  maxSkewMs: number | null;
  toleranceMs: number;
}

export interface AlignmentExceededEvent {
  skewMs: number;
  toleranceMs: number;
  imu1HostMs: number;
  imu2HostMs: number;
  sequence: number | null;
}
