/**
 * IMU Alignment Monitor
 *
 * Pairs IMU1/IMU2 frames (by sequence when both carry one, otherwise by
 * arrival) and tracks the host-time skew between the two halves of a pair.
 *
 * Events:
 *   'alignmentExceeded' (AlignmentExceededEvent)  first pair of a run over tolerance
 *   'alignmentRestored' (skewMs)                  first pair back within tolerance
 */

import { EventEmitter } from 'events';
import type { SensorFrame } from '../glove-protocol/types';
import { CircularBuffer } from '../shared/CircularBuffer';
import { createLogger } from '../shared/Logger';
import { ALIGNMENT_CONFIG } from './constants';
import type { AlignmentExceededEvent, AlignmentStats } from './types';

const log = createLogger('ImuAlignment');

type ImuSource = 'imu1' | 'imu2';

function isImu(frame: SensorFrame): frame is SensorFrame & { source: ImuSource } {
  return frame.source === 'imu1' || frame.source === 'imu2';
}

export class ImuAlignmentMonitor extends EventEmitter {
  private pending: Partial<Record<ImuSource, SensorFrame>> = {};
  private skews: CircularBuffer<number>;
  private pairs = 0;
  private unpaired = 0;
  private exceeded = 0;
  private lastSkewMs: number | null = null;
  private maxSkewMs: number | null = null;
  private outOfTolerance = false;

  constructor(
    private readonly toleranceMs: number = ALIGNMENT_CONFIG.TOLERANCE_MS,
    window: number = ALIGNMENT_CONFIG.WINDOW
  ) {
    super();
    this.skews = new CircularBuffer<number>(window);
  }

  observe(frame: SensorFrame): void {
    if (!isImu(frame) || !frame.valid) return;

    const other: ImuSource = frame.source === 'imu1' ? 'imu2' : 'imu1';
    const candidate = this.pending[other];

    if (candidate && this.matches(frame, candidate)) {
      this.pending[other] = undefined;
      const [imu1, imu2] = frame.source === 'imu1' ? [frame, candidate] : [candidate, frame];
      this.recordPair(imu1, imu2);
      return;
    }

    // Anything left waiting on either side is now stale
    if (candidate) {
      this.pending[other] = undefined;
      this.unpaired++;
    }
    if (this.pending[frame.source]) this.unpaired++;
    this.pending[frame.source] = frame;
  }

  private matches(a: SensorFrame, b: SensorFrame): boolean {
    const seqA = a.timestamp.sequence;
    const seqB = b.timestamp.sequence;
    return seqA === null || seqB === null || seqA === seqB;
  }

  private recordPair(imu1: SensorFrame, imu2: SensorFrame): void {
    const skewMs = Math.abs(imu1.timestamp.hostMs - imu2.timestamp.hostMs);
    this.pairs++;
    this.lastSkewMs = skewMs;
    this.maxSkewMs = Math.max(this.maxSkewMs ?? 0, skewMs);
    this.skews.push(skewMs);

    if (skewMs > this.toleranceMs) {
      this.exceeded++;
      if (!this.outOfTolerance) {
        this.outOfTolerance = true;
        const event: AlignmentExceededEvent = {
          skewMs,
          toleranceMs: this.toleranceMs,
          imu1HostMs: imu1.timestamp.hostMs,
          imu2HostMs: imu2.timestamp.hostMs,
          sequence: imu1.timestamp.sequence,
        };
        log.warn(`⚠️ IMU skew ${skewMs.toFixed(1)}ms exceeds ${this.toleranceMs}ms`);
        this.emit('alignmentExceeded', event);
      }
    } else if (this.outOfTolerance) {
      this.outOfTolerance = false;
      log.info(`✅ IMU skew back within tolerance (${skewMs.toFixed(1)}ms)`);
      this.emit('alignmentRestored', skewMs);
    }
  }

  getStats(): AlignmentStats {
    const window = this.skews.toArray();
    return {
      pairs: this.pairs,
      unpaired: this.unpaired,
      exceeded: this.exceeded,
      lastSkewMs: this.lastSkewMs,
      meanSkewMs: window.length > 0 ? window.reduce((sum, skew) => sum + skew, 0) / window.length : null,
      maxSkewMs: this.maxSkewMs,
      toleranceMs: this.toleranceMs,
    };
  }

  reset(): void {
    this.pending = {};
    this.skews.clear();
    this.pairs = 0;
    this.unpaired = 0;
    this.exceeded = 0;
    this.lastSkewMs = null;
    this.maxSkewMs = null;
    this.outOfTolerance = false;
  }
}
