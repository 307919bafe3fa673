/**
 * Characteristic Codec Tests
 */

import { DecodeError, InvalidConfigError } from '../shared/errors';
import {
  applyJoystickDeadzone,
  decodeBatteryCharging,
  decodeOverallStatus,
  decodeTelemetry,
  decodeText,
  decodeTimestamp,
  encodeOverallStatus,
  encodeTelemetry,
  encodeTimestamp,
} from './CharacteristicCodec';
import { DEFAULT_SENSOR_CONFIG, decodeConfig, encodeConfig, mergeConfig } from './ConfigCodec';
import { JOYSTICK, fullScaleFor } from './SensorTables';
import { ChargingState, CommandState, ComponentState, type TelemetryKey } from './types';

function imuPayload(raw: number[], sequence?: number): Buffer {
  const buffer = Buffer.alloc(sequence === undefined ? 18 : 20);
  raw.forEach((value, i) => buffer.writeInt16LE(value, i * 2));
  if (sequence !== undefined) buffer.writeUInt16LE(sequence, 18);
  return buffer;
}

function joystickPayload(x: number, y: number, pressed: number): Buffer {
  const buffer = Buffer.alloc(5);
  buffer.writeUInt16LE(x, 0);
  buffer.writeUInt16LE(y, 2);
  buffer.writeUInt8(pressed, 4);
  return buffer;
}

describe('CharacteristicCodec', () => {
  describe('IMU raw', () => {
    test('should scale gyro channels and keep accel/mag counts', () => {
      const frame = decodeTelemetry('imu1Raw', imuPayload([100, -200, 1000, 157, -31, 0, 45, -12, 30]), 12.5);

      expect(frame.source).toBe('imu1');
      expect(frame.values).toEqual([100, -200, 1000, 1.57, -0.31, 0, 45, -12, 30]);
      expect(frame.units).toEqual(['mg', 'mg', 'mg', 'rad/s', 'rad/s', 'rad/s', 'µT', 'µT', 'µT']);
      expect(frame.timestamp).toEqual({ hostMs: 12.5, sequence: null });
      expect(frame.valid).toBe(true);
      expect(frame.calibrated).toBe(false);
    });

    test('should read the trailing sequence counter of the 20-byte variant', () => {
      const frame = decodeTelemetry('imu2Raw', imuPayload([1, 2, 3, 4, 5, 6, 7, 8, 9], 513), 0);

      expect(frame.source).toBe('imu2');
      expect(frame.timestamp.sequence).toBe(513);
    });

    test('should reject a malformed length', () => {
      expect(() => decodeTelemetry('imu1Raw', Buffer.alloc(17), 0)).toThrow(DecodeError);
      expect(() => decodeTelemetry('imu1Raw', Buffer.alloc(19), 0)).toThrow('expected 18 or 20 bytes, got 19');
    });

    test('should produce frozen frames', () => {
      const frame = decodeTelemetry('imu1Raw', imuPayload([1, 2, 3, 4, 5, 6, 7, 8, 9]), 0);

      expect(Object.isFrozen(frame)).toBe(true);
      expect(Object.isFrozen(frame.values)).toBe(true);
    });
  });

  describe('round-trip', () => {
    const euler = Buffer.alloc(13);
    euler.writeFloatLE(90.5, 0);
    euler.writeFloatLE(-12.25, 4);
    euler.writeFloatLE(0.125, 8);
    euler.writeUInt8(3, 12);

    const flex = Buffer.alloc(20);
    [10.5, 22, 31.25, 4, 5.5].forEach((value, i) => flex.writeFloatLE(value, i * 4));

    const force = Buffer.alloc(4);
    force.writeFloatLE(7.75, 0);

    const payloads: Array<[TelemetryKey, Buffer]> = [
      ['imu1Raw', imuPayload([-32768, 32767, 0, 100, -100, 2000, -5, 5, 0])],
      ['imu2Raw', imuPayload([1, -1, 2, -2, 3, -3, 4, -4, 5], 65535)],
      ['imu1Euler', euler],
      ['joystick', joystickPayload(0, 4095, 1)],
      ['buttons', Buffer.from([1, 0, 1, 1])],
      ['force', force],
      ['flex', flex],
      ['batteryLevel', Buffer.from([87])],
    ];

    test.each(payloads)('should re-encode %s to the same bytes', (key, payload) => {
      const frame = decodeTelemetry(key, payload, 1);

      expect(encodeTelemetry(key, frame).equals(payload)).toBe(true);
      expect(decodeTelemetry(key, encodeTelemetry(key, frame), 1)).toEqual(frame);
    });
  });

  describe('joystick', () => {
    test('should decode the range midpoint within 1.5% of centre', () => {
      const frame = decodeTelemetry('joystick', joystickPayload(2048, 2047, 0), 0);

      expect(frame.values).toEqual([0, -1, 0]);
      expect(Math.abs(frame.values[1] ?? Infinity)).toBeLessThanOrEqual(0.015 * JOYSTICK.MAX);
    });

    test('should reject axis values above 4095', () => {
      expect(() => decodeTelemetry('joystick', joystickPayload(4096, 0, 0), 0)).toThrow(DecodeError);
    });

    test('should zero axes inside the ±100 deadzone', () => {
      const inside = decodeTelemetry('joystick', joystickPayload(2148, 1948, 1), 0);
      const outside = decodeTelemetry('joystick', joystickPayload(2149, 1000, 1), 0);

      expect(applyJoystickDeadzone(inside).values).toEqual([0, 0, 1]);
      expect(applyJoystickDeadzone(outside).values).toEqual([101, -1048, 1]);
    });
  });

  describe('validation', () => {
    test('should reject out-of-range flags and levels', () => {
      expect(() => decodeTelemetry('buttons', Buffer.from([0, 2, 0, 0]), 0)).toThrow(DecodeError);
      expect(() => decodeTelemetry('batteryLevel', Buffer.from([101]), 0)).toThrow(DecodeError);
    });

    test('should flag non-finite float payloads as invalid', () => {
      const force = Buffer.alloc(4);
      force.writeFloatLE(NaN, 0);

      const frame = decodeTelemetry('force', force, 0);
      expect(frame.source).toBe('pressure');
      expect(frame.valid).toBe(false);
    });
  });

  describe('metadata', () => {
    test('should decode charging and overall status', () => {
      expect(decodeBatteryCharging(Buffer.from([2]))).toBe(ChargingState.FULL);
      expect(() => decodeBatteryCharging(Buffer.from([3]))).toThrow(DecodeError);

      const status = decodeOverallStatus(Buffer.from([0, 2, 3, 1]));
      expect(status).toEqual({
        errorCode: 0,
        fuelGauge: ComponentState.IDLE,
        imu1: ComponentState.RUNNING,
        imu2: ComponentState.FAILED,
      });
      expect(encodeOverallStatus(status)).toEqual(Buffer.from([0, 2, 3, 1]));
    });

    test('should encode the device clock as u32 seconds', () => {
      const payload = encodeTimestamp(1_700_000_000.9);

      expect(payload.length).toBe(4);
      expect(decodeTimestamp(payload)).toBe(1_700_000_000);
    });

    test('should trim trailing NULs from strings', () => {
      expect(decodeText(Buffer.from('1.4.2\0\0', 'utf8'))).toBe('1.4.2');
    });
  });
});

describe('ConfigCodec', () => {
  test('should lay out the 15-byte config', () => {
    const config = mergeConfig(DEFAULT_SENSOR_CONFIG, {
      command: CommandState.RUN,
      imu1: { accelGyroRateHz: 416, magRateHz: 80, accelRangeG: 16, gyroRangeDps: 2000, magRangeGauss: 16 },
      imu2: { accelGyroRateHz: 12.5, magRateHz: 0.625 },
      updateIntervalMs: 300,
    });

    const payload = encodeConfig(config);

    expect([...payload]).toEqual([1, 5, 7, 0, 0, 3, 4, 3, 1, 2, 0, 44, 1, 0, 0]);
    expect(decodeConfig(payload)).toEqual(config);
  });

  test('should carry the reserved bytes through decode, merge and encode', () => {
    const payload = encodeConfig(DEFAULT_SENSOR_CONFIG);
    payload.writeUInt8(0x5a, 13);
    payload.writeUInt8(0x01, 14);

    const decoded = decodeConfig(payload);
    expect(decoded.reserved).toBe(0x015a);
    expect(encodeConfig(decoded).equals(payload)).toBe(true);

    const changed = encodeConfig(mergeConfig(decoded, { updateIntervalMs: 50 }));
    expect([...changed.subarray(13)]).toEqual([0x5a, 0x01]);
  });

  test('should reject non-enumerated rates and ranges before encoding', () => {
    const badRate = mergeConfig(DEFAULT_SENSOR_CONFIG, { imu1: { accelGyroRateHz: 100 } });
    const badRange = mergeConfig(DEFAULT_SENSOR_CONFIG, { imu2: { gyroRangeDps: 300 } });

    expect(() => encodeConfig(badRate)).toThrow(InvalidConfigError);
    expect(() => encodeConfig(badRate)).toThrow('Invalid imu1.accelGyroRateHz: 100 (allowed: 12.5, 26, 52, 104, 208, 416)');
    expect(() => encodeConfig(badRange)).toThrow(InvalidConfigError);
  });

  test('should reject an update interval outside 10-65535 ms', () => {
    expect(() => encodeConfig(mergeConfig(DEFAULT_SENSOR_CONFIG, { updateIntervalMs: 5 }))).toThrow(InvalidConfigError);
  });

  test('should reject out-of-table codes and wrong lengths on decode', () => {
    const payload = encodeConfig(DEFAULT_SENSOR_CONFIG);
    payload.writeUInt8(6, 1);

    expect(() => decodeConfig(payload)).toThrow(DecodeError);
    expect(() => decodeConfig(Buffer.alloc(14))).toThrow(DecodeError);
  });

  test('should derive full scale from the configured ranges', () => {
    const scale = fullScaleFor('imu1', DEFAULT_SENSOR_CONFIG);

    expect(scale?.slice(0, 3)).toEqual([4000, 4000, 4000]);
    expect(scale?.[3]).toBeCloseTo((500 * Math.PI) / 180);
    expect(scale?.slice(6)).toEqual([400, 400, 400]);
    expect(fullScaleFor('flex', DEFAULT_SENSOR_CONFIG)).toBeNull();
  });
});
