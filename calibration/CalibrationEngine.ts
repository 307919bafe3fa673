/**
 * Calibration Engine
 *
 * Applies per-source corrections (corrected = raw × scale − offset) to live frames,
 * captures rest windows for zero-calibration and drift checks, keeps rolling
 * drift windows over live frames, and hands raw captures to an external oracle.
 *
 * Events:
 *   'profileUpdated' (CalibrationProfile)
 *   'driftExceeded'  (DriftExceededError)  advisory only
 *   'driftRestored'  (source)
 */

import { EventEmitter } from 'events';
import { buildFrame } from '../glove-protocol/CharacteristicCodec';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import { CircularBuffer } from '../shared/CircularBuffer';
import { DriftExceededError, InsufficientSamplesError, InvalidConfigError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import type { CalibrationStore } from './CalibrationStore';
import type {
  CalibrationOracle,
  CalibrationOrigin,
  CalibrationProfile,
  CalibrationProfiles,
  CaptureOptions,
  DriftReport,
  FullScaleProvider,
} from './types';

const log = createLogger('CalibrationEngine');

export const CALIBRATION_CONFIG = {
  SAMPLES: 100,
  MIN_SAMPLES: 20,
  TIMEOUT_MS: 5000,
  // Drift limit as a fraction of full scale
  DRIFT_FRACTION: 0.01,
} as const;

interface ActiveCapture {
  source: SensorSource;
  target: number;
  frames: SensorFrame[];
  finish: () => void;
}

interface DriftMonitor {
  window: CircularBuffer<readonly number[]>;
  sums: number[];
  exceeded: boolean;
}

export interface CalibrationEngineOptions {
  fullScale: FullScaleProvider;
  store?: CalibrationStore | null;
  now?: () => Date;
}

function mean(frames: readonly SensorFrame[]): number[] {
  const width = frames[0]?.values.length ?? 0;
  const sums = new Array<number>(width).fill(0);
  for (const frame of frames) {
    for (let i = 0; i < width; i++) sums[i] += frame.values[i] ?? 0;
  }
  return sums.map(sum => sum / frames.length);
}

export class CalibrationEngine extends EventEmitter {
  private profiles: CalibrationProfiles = {};
  private captures = new Set<ActiveCapture>();
  private monitors = new Map<SensorSource, DriftMonitor>();
  private deviceKey: string | null = null;
  private readonly store: CalibrationStore | null;
  private readonly fullScale: FullScaleProvider;
  private readonly now: () => Date;

  constructor(options: CalibrationEngineOptions) {
    super();
    this.fullScale = options.fullScale;
    this.store = options.store ?? null;
    this.now = options.now ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Device binding & profiles
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Bind to a device and load its persisted profiles.
   */
  async loadDevice(deviceKey: string): Promise<CalibrationProfiles> {
    this.deviceKey = deviceKey;
    this.profiles = this.store ? await this.store.load(deviceKey) : {};
    this.monitors.forEach(monitor => this.resetMonitor(monitor));

    const count = Object.keys(this.profiles).length;
    if (count > 0) log.info(`📐 Loaded ${count} calibration profile(s) for ${deviceKey}`);
    return this.getProfiles();
  }

  getProfile(source: SensorSource): CalibrationProfile | null {
    return this.profiles[source] ?? null;
  }

  getProfiles(): CalibrationProfiles {
    return Object.freeze({ ...this.profiles });
  }

  async clearProfile(source: SensorSource): Promise<void> {
    const next = { ...this.profiles };
    delete next[source];
    this.profiles = next;
    await this.persist();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Live path
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Feed active captures with the raw frame and return the corrected frame.
   * Uncalibrated sources and invalid frames pass through unchanged.
   */
  process(frame: SensorFrame): SensorFrame {
    if (this.captures.size > 0) this.feedCaptures(frame);

    const output = this.applyProfile(frame);
    if (this.monitors.size > 0 && output.valid) this.feedMonitor(output);
    return output;
  }

  private applyProfile(frame: SensorFrame): SensorFrame {
    const profile = this.profiles[frame.source];
    if (!profile || !frame.valid || frame.calibrated) return frame;
    if (profile.offset.length !== frame.values.length) return frame;

    return buildFrame(
      frame.source,
      frame.timestamp.hostMs,
      frame.timestamp.sequence,
      this.correct(profile, frame.values),
      frame.units,
      frame.valid,
      true
    );
  }

  private correct(profile: CalibrationProfile, values: readonly number[]): number[] {
    return values.map((value, i) => value * (profile.scale[i] ?? 1) - (profile.offset[i] ?? 0));
  }

  private feedCaptures(frame: SensorFrame): void {
    if (!frame.valid) return;

    for (const capture of this.captures) {
      if (capture.source !== frame.source) continue;
      capture.frames.push(frame);
      if (capture.frames.length >= capture.target) capture.finish();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Rolling drift windows
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Track the corrected mean of the last `window` live frames of a source held at rest.
   * 'driftExceeded' fires when the mean crosses 1% of full scale, once per excursion.
   */
  monitorDrift(source: SensorSource, window: number = CALIBRATION_CONFIG.SAMPLES): void {
    this.monitors.set(source, { window: new CircularBuffer(window), sums: [], exceeded: false });
    log.info(`📏 Monitoring ${source} drift over ${window} frames`);
  }

  stopDriftMonitor(source: SensorSource): void {
    this.monitors.delete(source);
  }

  isMonitoringDrift(source: SensorSource): boolean {
    return this.monitors.has(source);
  }

  private resetMonitor(monitor: DriftMonitor): void {
    monitor.window.clear();
    monitor.sums = [];
    monitor.exceeded = false;
  }

  private feedMonitor(frame: SensorFrame): void {
    const monitor = this.monitors.get(frame.source);
    if (!monitor) return;

    if (monitor.sums.length !== frame.values.length) {
      this.resetMonitor(monitor);
      monitor.sums = frame.values.map(() => 0);
    }

    const evicted = monitor.window.push(frame.values);
    frame.values.forEach((value, i) => (monitor.sums[i] += value));
    evicted?.forEach((value, i) => (monitor.sums[i] -= value));
    if (!monitor.window.isFull()) return;

    const drift = monitor.sums.map(sum => sum / monitor.window.size());
    const limit = this.driftLimit(frame.source, drift.length);
    const exceeded = limit.some((max, i) => Math.abs(drift[i]) > max);
    if (exceeded === monitor.exceeded) return;

    monitor.exceeded = exceeded;
    if (!exceeded) {
      log.info(`✅ ${frame.source} drift back within 1% of full scale`);
      this.emit('driftRestored', frame.source);
    }
    this.recordDrift(frame.source, drift, limit, exceeded).catch((error: unknown) => {
      log.warn(`Saving ${frame.source} drift failed: ${describeError(error)}`);
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Captures
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Collect raw frames of one source until the target count or the timeout.
   * @throws InsufficientSamplesError when fewer than minSamples arrived
   */
  async capture(source: SensorSource, options: CaptureOptions = {}): Promise<SensorFrame[]> {
    const target = options.samples ?? CALIBRATION_CONFIG.SAMPLES;
    const minSamples = options.minSamples ?? CALIBRATION_CONFIG.MIN_SAMPLES;
    const timeoutMs = options.timeoutMs ?? CALIBRATION_CONFIG.TIMEOUT_MS;

    const frames = await new Promise<SensorFrame[]>(resolve => {
      const capture: ActiveCapture = {
        source,
        target,
        frames: [],
        finish: () => {
          clearTimeout(timer);
          this.captures.delete(capture);
          resolve(capture.frames);
        },
      };
      const timer = setTimeout(() => capture.finish(), timeoutMs);
      this.captures.add(capture);
    });

    if (frames.length < minSamples) {
      throw new InsufficientSamplesError(source, frames.length, minSamples);
    }
    return frames;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Calibration
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Capture a rest window and zero it: offset = mean × scale.
   */
  async zeroCalibrate(source: SensorSource, options: CaptureOptions = {}): Promise<CalibrationProfile> {
    log.info(`🎯 Zero calibration of ${source} started`);
    const frames = await this.capture(source, options);
    const average = mean(frames);

    const existing = this.profiles[source];
    const scale =
      existing && existing.scale.length === average.length ? [...existing.scale] : average.map(() => 1);
    const offset = average.map((value, i) => value * scale[i]);

    return this.commit(source, offset, scale, frames.length, 'zero');
  }

  /**
   * Hand a raw capture to the oracle and store its offset/scale.
   */
  async calibrateWithOracle(
    source: SensorSource,
    oracle: CalibrationOracle,
    options: CaptureOptions = {}
  ): Promise<CalibrationProfile> {
    const frames = await this.capture(source, options);
    log.info(`🧭 Handing ${frames.length} ${source} samples to calibration oracle`);

    const { offset, scale } = await oracle.calibrate(source, frames);
    const width = frames[0]?.values.length ?? 0;
    if (offset.length !== width || !offset.every(Number.isFinite)) {
      throw new InvalidConfigError(`${source}.offset`, `[${offset.join(', ')}]`);
    }
    if (scale.length !== width || !scale.every(v => Number.isFinite(v) && v !== 0)) {
      throw new InvalidConfigError(`${source}.scale`, `[${scale.join(', ')}]`);
    }

    return this.commit(source, offset, scale, frames.length, 'oracle');
  }

  /**
   * Capture a rest window and compare its corrected mean against 1% of full scale.
   * Exceeding the limit is reported through 'driftExceeded', never thrown.
   */
  async checkDrift(source: SensorSource, options: CaptureOptions = {}): Promise<DriftReport> {
    const frames = await this.capture(source, options);
    const average = mean(frames);

    const profile = this.profiles[source];
    const drift = profile && profile.offset.length === average.length ? this.correct(profile, average) : average;

    const limit = this.driftLimit(source, drift.length);
    if (limit.length === 0) {
      log.warn(`No full scale known for ${source}; drift recorded without a limit`);
    }
    const exceeded = limit.some((max, i) => Math.abs(drift[i]) > max);

    await this.recordDrift(source, drift, limit, exceeded);
    return { source, drift, limit, exceeded, sampleCount: frames.length };
  }

  private driftLimit(source: SensorSource, width: number): number[] {
    const fullScale = this.fullScale(source);
    return fullScale && fullScale.length === width
      ? fullScale.map(scale => scale * CALIBRATION_CONFIG.DRIFT_FRACTION)
      : [];
  }

  private async recordDrift(source: SensorSource, drift: number[], limit: number[], exceeded: boolean): Promise<void> {
    const profile = this.profiles[source];
    if (profile) {
      this.profiles = {
        ...this.profiles,
        [source]: Object.freeze({ ...profile, drift: Object.freeze([...drift]), driftExceeded: exceeded }),
      };
    }

    if (exceeded) {
      const error = new DriftExceededError(source, drift, limit);
      log.warn(`⚠️ ${error.message}`);
      this.emit('driftExceeded', error);
    }

    if (profile) await this.persist();
  }

  private async commit(
    source: SensorSource,
    offset: number[],
    scale: number[],
    sampleCount: number,
    origin: CalibrationOrigin
  ): Promise<CalibrationProfile> {
    const profile: CalibrationProfile = Object.freeze({
      source,
      offset: Object.freeze([...offset]),
      scale: Object.freeze([...scale]),
      drift: null,
      driftExceeded: false,
      sampleCount,
      calibratedAt: this.now().toISOString(),
      origin,
    });

    this.profiles = { ...this.profiles, [source]: profile };
    await this.persist();

    log.info(`✅ ${source} calibrated (${origin}, ${sampleCount} samples)`);
    this.emit('profileUpdated', profile);
    return profile;
  }

  private async persist(): Promise<void> {
    if (!this.store || !this.deviceKey) return;
    await this.store.save(this.deviceKey, this.profiles);
  }

  /**
   * Abandon active captures; their callers receive what was collected so far.
   */
  cancelCaptures(): void {
    Array.from(this.captures).forEach(capture => capture.finish());
  }
}
