/**
 * Characteristic Codec
 * Pure mapping between characteristic payloads (little-endian) and typed values.
 * Decoding never guesses: a wrong length or an out-of-range field is a DecodeError.
 */

import { DecodeError } from '../shared/errors';
import { JOYSTICK } from './SensorTables';
import {
  ChargingState,
  ComponentState,
  TELEMETRY_KEYS,
  type OverallStatus,
  type SensorFrame,
  type SensorSource,
  type TelemetryKey,
} from './types';

export const GYRO_COUNTS_PER_RAD_S = 100;

interface DecodedPayload {
  values: number[];
  sequence: number | null;
}

interface TelemetryLayout {
  readonly source: SensorSource;
  readonly lengths: readonly number[];
  readonly units: readonly string[];
  /** Float payloads are invalid when any value is not finite */
  readonly floating: boolean;
  decode(payload: Buffer, key: TelemetryKey): DecodedPayload;
  encode(values: readonly number[], sequence: number | null): Buffer;
}

// ─────────────────────────────────────────────────────────────────────────────
// Layouts
// ─────────────────────────────────────────────────────────────────────────────

const IMU_RAW_LENGTH = 18;
const IMU_RAW_SEQUENCED_LENGTH = 20;
const IMU_UNITS = ['mg', 'mg', 'mg', 'rad/s', 'rad/s', 'rad/s', 'µT', 'µT', 'µT'] as const;

const isGyroChannel = (index: number) => index >= 3 && index < 6;

function imuRawLayout(source: SensorSource): TelemetryLayout {
  return {
    source,
    lengths: [IMU_RAW_LENGTH, IMU_RAW_SEQUENCED_LENGTH],
    units: IMU_UNITS,
    floating: false,
    decode(payload) {
      const values: number[] = [];
      for (let i = 0; i < 9; i++) {
        const raw = payload.readInt16LE(i * 2);
        values.push(isGyroChannel(i) ? raw / GYRO_COUNTS_PER_RAD_S : raw);
      }
      const sequence = payload.length === IMU_RAW_SEQUENCED_LENGTH ? payload.readUInt16LE(IMU_RAW_LENGTH) : null;
      return { values, sequence };
    },
    encode(values, sequence) {
      const buffer = Buffer.alloc(sequence === null ? IMU_RAW_LENGTH : IMU_RAW_SEQUENCED_LENGTH);
      values.forEach((value, i) => {
        buffer.writeInt16LE(Math.round(isGyroChannel(i) ? value * GYRO_COUNTS_PER_RAD_S : value), i * 2);
      });
      if (sequence !== null) buffer.writeUInt16LE(sequence, IMU_RAW_LENGTH);
      return buffer;
    },
  };
}

const MAX_EULER_STATUS = 3;

function eulerLayout(source: SensorSource): TelemetryLayout {
  return {
    source,
    lengths: [13],
    units: ['deg', 'deg', 'deg', 'status'],
    floating: true,
    decode(payload, key) {
      const status = payload.readUInt8(12);
      if (status > MAX_EULER_STATUS) {
        throw new DecodeError(key, `calibration status ${status} out of range 0-${MAX_EULER_STATUS}`);
      }
      return {
        values: [payload.readFloatLE(0), payload.readFloatLE(4), payload.readFloatLE(8), status],
        sequence: null,
      };
    },
    encode(values) {
      const buffer = Buffer.alloc(13);
      buffer.writeFloatLE(values[0] ?? 0, 0);
      buffer.writeFloatLE(values[1] ?? 0, 4);
      buffer.writeFloatLE(values[2] ?? 0, 8);
      buffer.writeUInt8(values[3] ?? 0, 12);
      return buffer;
    },
  };
}

function flagsLayout(source: SensorSource, count: number): TelemetryLayout {
  return {
    source,
    lengths: [count],
    units: new Array<string>(count).fill('pressed'),
    floating: false,
    decode(payload, key) {
      const values = [...payload];
      const bad = values.findIndex(value => value > 1);
      if (bad >= 0) throw new DecodeError(key, `button ${bad} has value ${values[bad]}`);
      return { values, sequence: null };
    },
    encode(values) {
      return Buffer.from(values.map(value => (value ? 1 : 0)));
    },
  };
}

function floatsLayout(source: SensorSource, count: number, unit: string): TelemetryLayout {
  return {
    source,
    lengths: [count * 4],
    units: new Array<string>(count).fill(unit),
    floating: true,
    decode(payload) {
      const values: number[] = [];
      for (let i = 0; i < count; i++) values.push(payload.readFloatLE(i * 4));
      return { values, sequence: null };
    },
    encode(values) {
      const buffer = Buffer.alloc(count * 4);
      values.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
      return buffer;
    },
  };
}

const joystickLayout: TelemetryLayout = {
  source: 'joystick',
  lengths: [5],
  units: ['counts', 'counts', 'pressed'],
  floating: false,
  decode(payload, key) {
    const x = payload.readUInt16LE(0);
    const y = payload.readUInt16LE(2);
    const pressed = payload.readUInt8(4);
    if (x > JOYSTICK.MAX || y > JOYSTICK.MAX) {
      throw new DecodeError(key, `axis (${x}, ${y}) outside 0-${JOYSTICK.MAX}`);
    }
    if (pressed > 1) throw new DecodeError(key, `button value ${pressed}`);
    return { values: [x - JOYSTICK.CENTER, y - JOYSTICK.CENTER, pressed], sequence: null };
  },
  encode(values) {
    const buffer = Buffer.alloc(5);
    buffer.writeUInt16LE(Math.round((values[0] ?? 0) + JOYSTICK.CENTER), 0);
    buffer.writeUInt16LE(Math.round((values[1] ?? 0) + JOYSTICK.CENTER), 2);
    buffer.writeUInt8(values[2] ? 1 : 0, 4);
    return buffer;
  },
};

const batteryLayout: TelemetryLayout = {
  source: 'battery',
  lengths: [1],
  units: ['%'],
  floating: false,
  decode(payload, key) {
    const level = payload.readUInt8(0);
    if (level > 100) throw new DecodeError(key, `battery level ${level}%`);
    return { values: [level], sequence: null };
  },
  encode(values) {
    return Buffer.from([values[0] ?? 0]);
  },
};

const LAYOUTS: Record<TelemetryKey, TelemetryLayout> = {
  imu1Raw: imuRawLayout('imu1'),
  imu2Raw: imuRawLayout('imu2'),
  imu1Euler: eulerLayout('imu1Orientation'),
  imu2Euler: eulerLayout('imu2Orientation'),
  joystick: joystickLayout,
  buttons: flagsLayout('buttons', 4),
  force: floatsLayout('pressure', 1, 'kΩ'),
  flex: floatsLayout('flex', 5, 'kΩ'),
  batteryLevel: batteryLayout,
};

// ─────────────────────────────────────────────────────────────────────────────
// Telemetry
// ─────────────────────────────────────────────────────────────────────────────

export function sourceOf(key: TelemetryKey): SensorSource {
  return LAYOUTS[key].source;
}

export function unitsOf(key: TelemetryKey): readonly string[] {
  return LAYOUTS[key].units;
}

/** Units of a source's values (empty for sources without a telemetry layout) */
export function unitsOfSource(source: SensorSource): readonly string[] {
  const key = TELEMETRY_KEYS.find(candidate => LAYOUTS[candidate].source === source);
  return key ? LAYOUTS[key].units : [];
}

function checkLength(key: string, payload: Buffer, lengths: readonly number[]): void {
  if (!lengths.includes(payload.length)) {
    throw new DecodeError(key, `expected ${lengths.join(' or ')} bytes, got ${payload.length}`);
  }
}

export function buildFrame(
  source: SensorSource,
  hostMs: number,
  sequence: number | null,
  values: readonly number[],
  units: readonly string[],
  valid: boolean,
  calibrated: boolean = false
): SensorFrame {
  return Object.freeze({
    source,
    timestamp: Object.freeze({ hostMs, sequence }),
    values: Object.freeze([...values]),
    units,
    valid,
    calibrated,
  });
}

export function decodeTelemetry(key: TelemetryKey, payload: Buffer, hostMs: number): SensorFrame {
  const layout = LAYOUTS[key];
  checkLength(key, payload, layout.lengths);

  const { values, sequence } = layout.decode(payload, key);
  const valid = !layout.floating || values.every(Number.isFinite);
  return buildFrame(layout.source, hostMs, sequence, values, layout.units, valid);
}

/** Inverse of decodeTelemetry; used by the simulated glove and the round-trip tests */
export function encodeTelemetry(key: TelemetryKey, frame: Pick<SensorFrame, 'values' | 'timestamp'>): Buffer {
  return LAYOUTS[key].encode(frame.values, frame.timestamp.sequence);
}

/**
 * Zero the joystick axes inside ±deadzone counts of centre.
 */
export function applyJoystickDeadzone(frame: SensorFrame, deadzone: number = JOYSTICK.DEADZONE): SensorFrame {
  if (frame.source !== 'joystick') return frame;

  const values = frame.values.map((value, i) => (i < 2 && Math.abs(value) <= deadzone ? 0 : value));
  return buildFrame(
    frame.source,
    frame.timestamp.hostMs,
    frame.timestamp.sequence,
    values,
    frame.units,
    frame.valid,
    frame.calibrated
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Metadata
// ─────────────────────────────────────────────────────────────────────────────

const CHARGING_STATES: readonly ChargingState[] = [
  ChargingState.NOT_CHARGING,
  ChargingState.CHARGING,
  ChargingState.FULL,
];

const COMPONENT_STATES: readonly ComponentState[] = [
  ComponentState.NOT_DETECTED,
  ComponentState.FAILED,
  ComponentState.IDLE,
  ComponentState.RUNNING,
];

export function decodeBatteryCharging(payload: Buffer): ChargingState {
  checkLength('batteryCharging', payload, [1]);
  const value = payload.readUInt8(0);
  const state = CHARGING_STATES.find(candidate => candidate === value);
  if (state === undefined) {
    throw new DecodeError('batteryCharging', `state ${value} out of range 0-2`);
  }
  return state;
}

export function encodeBatteryCharging(state: ChargingState): Buffer {
  return Buffer.from([state]);
}

function toComponentState(value: number, field: string): ComponentState {
  const state = COMPONENT_STATES.find(candidate => candidate === value);
  if (state === undefined) {
    throw new DecodeError('overallStatus', `${field} state ${value} out of range 0-3`);
  }
  return state;
}

export function decodeOverallStatus(payload: Buffer): OverallStatus {
  checkLength('overallStatus', payload, [4]);
  return Object.freeze({
    errorCode: payload.readUInt8(0),
    fuelGauge: toComponentState(payload.readUInt8(1), 'fuel gauge'),
    imu1: toComponentState(payload.readUInt8(2), 'IMU1'),
    imu2: toComponentState(payload.readUInt8(3), 'IMU2'),
  });
}

export function encodeOverallStatus(status: OverallStatus): Buffer {
  return Buffer.from([status.errorCode, status.fuelGauge, status.imu1, status.imu2]);
}

/** Device clock: u32 Unix seconds */
export function decodeTimestamp(payload: Buffer): number {
  checkLength('timestamp', payload, [4]);
  return payload.readUInt32LE(0);
}

export function encodeTimestamp(unixSeconds: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(Math.floor(unixSeconds), 0);
  return buffer;
}

export function decodeText(payload: Buffer): string {
  return payload.toString('utf8').replace(/\0+$/, '');
}

export function encodeText(value: string): Buffer {
  return Buffer.from(value, 'utf8');
}
