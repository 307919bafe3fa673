/**
 * Glove protocol types
 * Decoded telemetry frames, sensor configuration and device metadata
 */

// ─────────────────────────────────────────────────────────────────────────────
// Sources & characteristics
// ─────────────────────────────────────────────────────────────────────────────

export const SENSOR_SOURCES = [
  'imu1',
  'imu2',
  'imu1Orientation',
  'imu2Orientation',
  'joystick',
  'buttons',
  'pressure',
  'flex',
  'battery',
] as const;

export type SensorSource = (typeof SENSOR_SOURCES)[number];

/** Characteristics that carry telemetry and decode to a SensorFrame */
export const TELEMETRY_KEYS = [
  'imu1Raw',
  'imu2Raw',
  'imu1Euler',
  'imu2Euler',
  'joystick',
  'buttons',
  'force',
  'flex',
  'batteryLevel',
] as const;

export type TelemetryKey = (typeof TELEMETRY_KEYS)[number];

export type MetadataKey =
  | 'batteryCharging'
  | 'overallStatus'
  | 'config'
  | 'timestamp'
  | 'firmwareRevision'
  | 'hardwareRevision'
  | 'modelNumber'
  | 'manufacturerName';

export type CharacteristicKey = TelemetryKey | MetadataKey;

export function isTelemetryKey(key: CharacteristicKey): key is TelemetryKey {
  return TELEMETRY_KEYS.some(telemetryKey => telemetryKey === key);
}

// ─────────────────────────────────────────────────────────────────────────────
// Sensor frames
// ─────────────────────────────────────────────────────────────────────────────

export interface FrameTimestamp {
  /** Monotonic host capture time (ms) */
  readonly hostMs: number;
  /** Device-side counter when the payload carries one */
  readonly sequence: number | null;
}

export interface SensorFrame {
  readonly source: SensorSource;
  readonly timestamp: FrameTimestamp;
  readonly values: readonly number[];
  readonly units: readonly string[];
  readonly valid: boolean;
  readonly calibrated: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sensor configuration
// ─────────────────────────────────────────────────────────────────────────────

export enum CommandState {
  IDLE = 0,
  RUN = 1,
  CALIBRATE_IMU1 = 2,
  CALIBRATE_IMU2 = 3,
}

export type ImuId = 'imu1' | 'imu2';

export interface ImuConfig {
  readonly accelGyroRateHz: number;
  readonly magRateHz: number;
  readonly accelRangeG: number;
  readonly gyroRangeDps: number;
  readonly magRangeGauss: number;
}

export interface SensorConfig {
  readonly command: CommandState;
  readonly imu1: ImuConfig;
  readonly imu2: ImuConfig;
  /** Update interval of joystick, buttons, force and flex sensors */
  readonly updateIntervalMs: number;
  /** Bytes 13-14 as last read; written back as-is */
  readonly reserved: number;
}

export interface SensorConfigChange {
  command?: CommandState;
  imu1?: Partial<ImuConfig>;
  imu2?: Partial<ImuConfig>;
  updateIntervalMs?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Device metadata
// ─────────────────────────────────────────────────────────────────────────────

export enum ChargingState {
  NOT_CHARGING = 0,
  CHARGING = 1,
  FULL = 2,
}

export enum ComponentState {
  NOT_DETECTED = 0,
  FAILED = 1,
  IDLE = 2,
  RUNNING = 3,
}

export interface OverallStatus {
  readonly errorCode: number;
  readonly fuelGauge: ComponentState;
  readonly imu1: ComponentState;
  readonly imu2: ComponentState;
}

export interface DeviceInfo {
  readonly address: string;
  readonly name: string;
  readonly firmwareRevision: string | null;
  readonly hardwareRevision: string | null;
  readonly modelNumber: string | null;
  readonly manufacturerName: string | null;
  readonly batteryLevel: number | null;
  readonly charging: ChargingState | null;
  readonly status: OverallStatus | null;
}
