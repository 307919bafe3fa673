export { DeviceClockSync } from './DeviceClockSync';
export type { ClockSyncOptions } from './DeviceClockSync';
export { ImuAlignmentMonitor } from './ImuAlignmentMonitor';
export { OffsetEstimator } from './OffsetEstimator';
export { ALIGNMENT_CONFIG, TIME_SYNC_CONFIG } from './constants';
export * from './types';
