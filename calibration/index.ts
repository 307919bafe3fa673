export { CalibrationEngine, CALIBRATION_CONFIG } from './CalibrationEngine';
export type { CalibrationEngineOptions } from './CalibrationEngine';
export { CalibrationStore } from './CalibrationStore';
export type {
  CalibrationOrigin,
  CalibrationProfile,
  CalibrationProfiles,
  CaptureOptions,
  DriftReport,
  OracleResult,
  CalibrationOracle,
  FullScaleProvider,
} from './types';
