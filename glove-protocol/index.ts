export * from './types';
export * from './SensorTables';
export * from './GattProfile';
export * from './CharacteristicCodec';
export * from './ConfigCodec';
