/**
 * Glove GATT profile
 * UUIDs are lowercase without dashes, the form noble reports them in.
 */

import type { CharacteristicKey } from './types';

export const GLOVE_SERVICES = {
  BATTERY: '180f',
  DEVICE_INFO: '180a',
  SENSOR: '7a3b0001e1f24c8b9d2a5f6e8c4b1a90',
  CONTROL: '7a3b0002e1f24c8b9d2a5f6e8c4b1a90',
} as const;

export type GloveServiceName = keyof typeof GLOVE_SERVICES;

export interface CharacteristicDefinition {
  readonly key: CharacteristicKey;
  readonly service: GloveServiceName;
  readonly uuid: string;
  readonly notify: boolean;
  readonly write: boolean;
  /** Connection fails with DeviceUnreachable when a required characteristic is missing */
  readonly required: boolean;
}

function define(
  key: CharacteristicKey,
  service: GloveServiceName,
  uuid: string,
  flags: { notify?: boolean; write?: boolean; required?: boolean } = {}
): CharacteristicDefinition {
  return {
    key,
    service,
    uuid,
    notify: flags.notify ?? false,
    write: flags.write ?? false,
    required: flags.required ?? false,
  };
}

export const GLOVE_CHARACTERISTICS: readonly CharacteristicDefinition[] = [
  // Standard services
  define('batteryLevel', 'BATTERY', '2a19', { notify: true }),
  define('firmwareRevision', 'DEVICE_INFO', '2a26'),
  define('hardwareRevision', 'DEVICE_INFO', '2a27'),
  define('modelNumber', 'DEVICE_INFO', '2a24'),
  define('manufacturerName', 'DEVICE_INFO', '2a29'),

  // Sensor service
  define('imu1Raw', 'SENSOR', '7a3b1001e1f24c8b9d2a5f6e8c4b1a90', { notify: true, required: true }),
  define('imu2Raw', 'SENSOR', '7a3b1002e1f24c8b9d2a5f6e8c4b1a90', { notify: true, required: true }),
  define('imu1Euler', 'SENSOR', '7a3b1003e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('imu2Euler', 'SENSOR', '7a3b1004e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('joystick', 'SENSOR', '7a3b1005e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('buttons', 'SENSOR', '7a3b1006e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('force', 'SENSOR', '7a3b1007e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('flex', 'SENSOR', '7a3b1008e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),

  // Control service
  define('config', 'CONTROL', '7a3b2001e1f24c8b9d2a5f6e8c4b1a90', { write: true, required: true }),
  define('timestamp', 'CONTROL', '7a3b2002e1f24c8b9d2a5f6e8c4b1a90', { write: true }),
  define('batteryCharging', 'CONTROL', '7a3b2003e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
  define('overallStatus', 'CONTROL', '7a3b2004e1f24c8b9d2a5f6e8c4b1a90', { notify: true }),
];

const BY_KEY = new Map(GLOVE_CHARACTERISTICS.map(def => [def.key, def]));
const BY_UUID = new Map(GLOVE_CHARACTERISTICS.map(def => [def.uuid, def]));

export function getCharacteristic(key: CharacteristicKey): CharacteristicDefinition {
  const def = BY_KEY.get(key);
  if (!def) throw new Error(`Unknown characteristic: ${key}`);
  return def;
}

export function findCharacteristicByUuid(uuid: string): CharacteristicDefinition | undefined {
  return BY_UUID.get(normalizeUuid(uuid));
}

/** noble form: lowercase, no dashes */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}

export function serviceUuids(): string[] {
  return Object.values(GLOVE_SERVICES);
}
