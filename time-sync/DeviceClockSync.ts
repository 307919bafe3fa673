/**
 * Device Clock Sync
 *
 * Sets the glove RTC (u32 Unix seconds) from the host clock, confirms the
 * read-back and measures the remaining offset over a few timestamp reads.
 */

import { decodeTimestamp, encodeTimestamp } from '../glove-protocol/CharacteristicCodec';
import { createLogger } from '../shared/Logger';
import { TIME_SYNC_CONFIG } from './constants';
import { OffsetEstimator } from './OffsetEstimator';
import type { ClockSyncResult, ClockSyncTarget, WallClock } from './types';

const log = createLogger('DeviceClockSync');

export interface ClockSyncOptions {
  samples?: number;
}

export class DeviceClockSync {
  private lastResult: ClockSyncResult | null = null;
  private readonly estimator = new OffsetEstimator();

  constructor(private readonly wallClock: WallClock = Date.now) {}

  getLastResult(): ClockSyncResult | null {
    return this.lastResult;
  }

  /**
   * @returns null when the glove exposes no timestamp characteristic
   */
  async sync(target: ClockSyncTarget, options: ClockSyncOptions = {}): Promise<ClockSyncResult | null> {
    if (!target.hasCharacteristic('timestamp')) {
      log.warn('Glove has no timestamp characteristic; clock not set');
      return null;
    }

    const samples = Math.max(1, options.samples ?? TIME_SYNC_CONFIG.READ_SAMPLES);
    const writtenSeconds = Math.floor(this.wallClock() / 1000);
    const ack = await target.writeConfig('timestamp', encodeTimestamp(writtenSeconds));
    const readBackSeconds = decodeTimestamp(ack);

    this.estimator.reset();
    for (let i = 0; i < samples; i++) {
      const T1 = this.wallClock();
      const payload = await target.read('timestamp');
      const T4 = this.wallClock();
      this.estimator.addSample(T1, decodeTimestamp(payload) * 1000, T4);
    }

    const { medianOffset, avgRTT, sampleCount } = this.estimator.computeMedianOffset();
    const offsetSeconds = medianOffset / 1000;
    const result: ClockSyncResult = {
      writtenSeconds,
      readBackSeconds,
      offsetSeconds,
      avgRttMs: avgRTT,
      sampleCount,
      inSync: Math.abs(offsetSeconds) <= TIME_SYNC_CONFIG.MAX_OFFSET_SECONDS,
      syncedAt: new Date(this.wallClock()).toISOString(),
    };

    if (result.inSync) {
      log.info(`⏱️ Glove clock set (offset ${offsetSeconds.toFixed(3)}s, RTT ${avgRTT.toFixed(1)}ms)`);
    } else {
      log.warn(`⚠️ Glove clock off by ${offsetSeconds.toFixed(3)}s after sync`);
    }

    this.lastResult = result;
    return result;
  }
}
