/**
 * Calibration types
 */

import type { SensorFrame, SensorSource } from '../glove-protocol/types';

export type CalibrationOrigin = 'zero' | 'oracle';

/**
 * Per-source correction: corrected = raw × scale − offset
 */
export interface CalibrationProfile {
  readonly source: SensorSource;
  readonly offset: readonly number[];
  readonly scale: readonly number[];
  /** Corrected rest-window mean from the last drift check */
  readonly drift: readonly number[] | null;
  readonly driftExceeded: boolean;
  readonly sampleCount: number;
  /** ISO-8601 */
  readonly calibratedAt: string;
  readonly origin: CalibrationOrigin;
}

export type CalibrationProfiles = Partial<Record<SensorSource, CalibrationProfile>>;

export interface CaptureOptions {
  /** Stop once this many valid frames arrived */
  samples?: number;
  /** Fewer than this by the timeout → InsufficientSamples */
  minSamples?: number;
  timeoutMs?: number;
}

export interface DriftReport {
  source: SensorSource;
  /** Corrected mean of the rest window per channel */
  drift: number[];
  /** 1% of full scale per channel (empty when full scale is unknown) */
  limit: number[];
  exceeded: boolean;
  sampleCount: number;
}

export interface OracleResult {
  offset: number[];
  scale: number[];
}

/**
 * External calibration tool: receives raw captures, returns a correction.
 */
export interface CalibrationOracle {
  calibrate(source: SensorSource, samples: readonly SensorFrame[]): Promise<OracleResult>;
}

/** Full-scale magnitude per channel under the current config */
export type FullScaleProvider = (source: SensorSource) => number[] | null;
