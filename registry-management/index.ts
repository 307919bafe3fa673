/**
 * Registry Management Module
 * Last acknowledged glove config and device metadata
 */

export { DeviceConfigRegistry } from './DeviceConfigRegistry';
export type { ConfigTarget, RegistrySnapshot } from './DeviceConfigRegistry';
