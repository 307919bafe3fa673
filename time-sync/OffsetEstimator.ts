/**
 * Clock Offset Estimator
 *
 * NTP-style midpoint offsets with RTT filtering:
 * - Samples sorted by round-trip time, the slowest dropped
 * - Median offset of the rest
 */

import { TIME_SYNC_CONFIG } from './constants';
import type { TimeSyncSample } from './types';

export class OffsetEstimator {
  private samples: TimeSyncSample[] = [];

  /**
   * offset = deviceMs - (T1 + T4) / 2
   */
  addSample(T1: number, deviceMs: number, T4: number): void {
    const RTT = T4 - T1;
    const offset = deviceMs - (T1 + T4) / 2;
    this.samples.push({ T1, T4, deviceMs, RTT, offset });
  }

  computeMedianOffset(): { medianOffset: number; avgRTT: number; sampleCount: number } {
    if (this.samples.length === 0) {
      throw new Error('No samples collected');
    }

    // Lowest RTT first
    const sorted = [...this.samples].sort((a, b) => a.RTT - b.RTT);
    const removeCount = Math.floor(sorted.length * TIME_SYNC_CONFIG.OUTLIER_REMOVAL_PERCENT);
    const kept = sorted.slice(0, sorted.length - removeCount);

    const offsets = kept.map(s => s.offset).sort((a, b) => a - b);
    const mid = Math.floor(offsets.length / 2);
    const medianOffset = offsets.length % 2 === 0 ? (offsets[mid - 1] + offsets[mid]) / 2 : offsets[mid];

    const avgRTT = kept.reduce((sum, s) => sum + s.RTT, 0) / kept.length;

    return { medianOffset, avgRTT, sampleCount: kept.length };
  }

  getSamples(): ReadonlyArray<TimeSyncSample> {
    return this.samples;
  }

  reset(): void {
    this.samples = [];
  }
}
