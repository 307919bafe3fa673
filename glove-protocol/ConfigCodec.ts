/**
 * Config characteristic codec (15 bytes)
 *
 *   [0]      command state
 *   [1..2]   IMU1 accel/gyro rate code, mag rate code
 *   [3..4]   IMU2 accel/gyro rate code, mag rate code
 *   [5..7]   IMU1 accel / gyro / mag range codes
 *   [8..10]  IMU2 accel / gyro / mag range codes
 *   [11..12] u16 update interval (ms)
 *   [13..14] u16 reserved, carried through unchanged
 */

import { DecodeError, InvalidConfigError } from '../shared/errors';
import {
  ACCEL_GYRO_RATES_HZ,
  ACCEL_RANGES_G,
  GYRO_RANGES_DPS,
  MAG_RANGES_GAUSS,
  MAG_RATES_HZ,
  UPDATE_INTERVAL_MS,
  codeOf,
  valueAt,
} from './SensorTables';
import { CommandState, type ImuConfig, type ImuId, type SensorConfig, type SensorConfigChange } from './types';

export const CONFIG_LENGTH = 15;

const COMMAND_STATES: readonly CommandState[] = [
  CommandState.IDLE,
  CommandState.RUN,
  CommandState.CALIBRATE_IMU1,
  CommandState.CALIBRATE_IMU2,
];

export const DEFAULT_IMU_CONFIG: ImuConfig = Object.freeze({
  accelGyroRateHz: 104,
  magRateHz: 10,
  accelRangeG: 4,
  gyroRangeDps: 500,
  magRangeGauss: 4,
});

export const DEFAULT_SENSOR_CONFIG: SensorConfig = Object.freeze({
  command: CommandState.IDLE,
  imu1: DEFAULT_IMU_CONFIG,
  imu2: DEFAULT_IMU_CONFIG,
  updateIntervalMs: 20,
  reserved: 0,
});

function imuCodes(imu: ImuConfig, id: ImuId) {
  return {
    rate: codeOf(ACCEL_GYRO_RATES_HZ, imu.accelGyroRateHz, `${id}.accelGyroRateHz`),
    magRate: codeOf(MAG_RATES_HZ, imu.magRateHz, `${id}.magRateHz`),
    accel: codeOf(ACCEL_RANGES_G, imu.accelRangeG, `${id}.accelRangeG`),
    gyro: codeOf(GYRO_RANGES_DPS, imu.gyroRangeDps, `${id}.gyroRangeDps`),
    mag: codeOf(MAG_RANGES_GAUSS, imu.magRangeGauss, `${id}.magRangeGauss`),
  };
}

function checkCommand(command: number): CommandState {
  const state = COMMAND_STATES.find(candidate => candidate === command);
  if (state === undefined) throw new InvalidConfigError('command', command, COMMAND_STATES);
  return state;
}

function checkUpdateInterval(ms: number): void {
  if (!Number.isInteger(ms) || ms < UPDATE_INTERVAL_MS.MIN || ms > UPDATE_INTERVAL_MS.MAX) {
    throw new InvalidConfigError('updateIntervalMs', ms, [UPDATE_INTERVAL_MS.MIN, UPDATE_INTERVAL_MS.MAX]);
  }
}

export function encodeConfig(config: SensorConfig): Buffer {
  const command = checkCommand(config.command);
  const imu1 = imuCodes(config.imu1, 'imu1');
  const imu2 = imuCodes(config.imu2, 'imu2');
  checkUpdateInterval(config.updateIntervalMs);

  const buffer = Buffer.alloc(CONFIG_LENGTH);
  buffer.writeUInt8(command, 0);
  buffer.writeUInt8(imu1.rate, 1);
  buffer.writeUInt8(imu1.magRate, 2);
  buffer.writeUInt8(imu2.rate, 3);
  buffer.writeUInt8(imu2.magRate, 4);
  buffer.writeUInt8(imu1.accel, 5);
  buffer.writeUInt8(imu1.gyro, 6);
  buffer.writeUInt8(imu1.mag, 7);
  buffer.writeUInt8(imu2.accel, 8);
  buffer.writeUInt8(imu2.gyro, 9);
  buffer.writeUInt8(imu2.mag, 10);
  buffer.writeUInt16LE(config.updateIntervalMs, 11);
  buffer.writeUInt16LE(config.reserved, 13);
  return buffer;
}

function decodeImu(payload: Buffer, id: ImuId, rateOffset: number, rangeOffset: number): ImuConfig {
  return Object.freeze({
    accelGyroRateHz: valueAt(ACCEL_GYRO_RATES_HZ, payload.readUInt8(rateOffset), `${id}.accelGyroRate`),
    magRateHz: valueAt(MAG_RATES_HZ, payload.readUInt8(rateOffset + 1), `${id}.magRate`),
    accelRangeG: valueAt(ACCEL_RANGES_G, payload.readUInt8(rangeOffset), `${id}.accelRange`),
    gyroRangeDps: valueAt(GYRO_RANGES_DPS, payload.readUInt8(rangeOffset + 1), `${id}.gyroRange`),
    magRangeGauss: valueAt(MAG_RANGES_GAUSS, payload.readUInt8(rangeOffset + 2), `${id}.magRange`),
  });
}

export function decodeConfig(payload: Buffer): SensorConfig {
  if (payload.length !== CONFIG_LENGTH) {
    throw new DecodeError('config', `expected ${CONFIG_LENGTH} bytes, got ${payload.length}`);
  }

  const rawCommand = payload.readUInt8(0);
  const command = COMMAND_STATES.find(candidate => candidate === rawCommand);
  if (command === undefined) throw new DecodeError('config', `command ${rawCommand} out of range 0-3`);

  const updateIntervalMs = payload.readUInt16LE(11);
  if (updateIntervalMs < UPDATE_INTERVAL_MS.MIN) {
    throw new DecodeError('config', `update interval ${updateIntervalMs}ms below ${UPDATE_INTERVAL_MS.MIN}ms`);
  }

  return Object.freeze({
    command,
    imu1: decodeImu(payload, 'imu1', 1, 5),
    imu2: decodeImu(payload, 'imu2', 3, 8),
    updateIntervalMs,
    reserved: payload.readUInt16LE(13),
  });
}

/** Apply a partial change over the current config (no validation) */
export function mergeConfig(current: SensorConfig, change: SensorConfigChange): SensorConfig {
  return Object.freeze({
    command: change.command ?? current.command,
    imu1: Object.freeze({ ...current.imu1, ...change.imu1 }),
    imu2: Object.freeze({ ...current.imu2, ...change.imu2 }),
    updateIntervalMs: change.updateIntervalMs ?? current.updateIntervalMs,
    reserved: current.reserved,
  });
}

export function configsEqual(a: SensorConfig, b: SensorConfig): boolean {
  return encodeConfig(a).equals(encodeConfig(b));
}
