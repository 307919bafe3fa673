/**
 * Enumerated rate/range tables
 * The wire carries the index into each table; both IMUs share the accel/gyro rate table.
 */

import { DecodeError, InvalidConfigError } from '../shared/errors';
import type { SensorConfig, SensorSource } from './types';

export const ACCEL_GYRO_RATES_HZ = [12.5, 26, 52, 104, 208, 416] as const;
export const MAG_RATES_HZ = [0.625, 1.25, 2.5, 5, 10, 20, 40, 80] as const;
export const ACCEL_RANGES_G = [2, 4, 8, 16] as const;
export const GYRO_RANGES_DPS = [125, 250, 500, 1000, 2000] as const;
export const MAG_RANGES_GAUSS = [4, 8, 12, 16] as const;

export const UPDATE_INTERVAL_MS = { MIN: 10, MAX: 0xffff } as const;

export const JOYSTICK = {
  MAX: 4095,
  CENTER: 2048,
  DEADZONE: 100,
} as const;

/** Wire code of an enumerated value; anything outside the table is rejected before encoding */
export function codeOf(table: readonly number[], value: number, field: string): number {
  const code = table.indexOf(value);
  if (code < 0) {
    throw new InvalidConfigError(field, value, table);
  }
  return code;
}

/** Enumerated value of a wire code */
export function valueAt(table: readonly number[], code: number, field: string): number {
  const value = table[code];
  if (value === undefined) {
    throw new DecodeError('config', `${field} code ${code} out of range 0-${table.length - 1}`);
  }
  return value;
}

// ─────────────────────────────────────────────────────────────────────────────
// Full scale
// ─────────────────────────────────────────────────────────────────────────────

const MG_PER_G = 1000;
const MICROTESLA_PER_GAUSS = 100;
const RAD_PER_DEG = Math.PI / 180;

/**
 * Per-channel full scale of a source under the given config, in decoded units.
 * Null for sources whose range is not configurable.
 */
export function fullScaleFor(source: SensorSource, config: SensorConfig): number[] | null {
  switch (source) {
    case 'imu1':
    case 'imu2': {
      const imu = config[source];
      const accel = imu.accelRangeG * MG_PER_G;
      const gyro = imu.gyroRangeDps * RAD_PER_DEG;
      const mag = imu.magRangeGauss * MICROTESLA_PER_GAUSS;
      return [accel, accel, accel, gyro, gyro, gyro, mag, mag, mag];
    }
    case 'joystick':
      return [JOYSTICK.CENTER, JOYSTICK.CENTER, 1];
    default:
      return null;
  }
}
