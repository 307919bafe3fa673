/**
 * Display Feed
 *
 * Router subscriber for UI clients: keeps only the latest frame per source and
 * flushes them as one batch per display tick (60 Hz), plus a status snapshot
 * every 100 ms. Joystick axes get the centre deadzone before display.
 *
 * Events:
 *   'message' (DisplayMessage)
 */

import { EventEmitter } from 'events';
import { applyJoystickDeadzone } from '../glove-protocol/CharacteristicCodec';
import { JOYSTICK } from '../glove-protocol/SensorTables';
import { SENSOR_SOURCES, type SensorFrame, type SensorSource } from '../glove-protocol/types';
import type { FrameHandler, SubscribeOptions } from '../telemetry/TelemetryRouter';
import { createLogger } from '../shared/Logger';
import {
  MESSAGE_TYPES,
  type DeviceStatusMessage,
  type DisplayFrame,
  type DisplayStatus,
  type SensorBatchMessage,
} from './types/MessageTypes';

const log = createLogger('DisplayFeed');

export const DISPLAY_CONFIG = {
  FRAME_RATE_HZ: 60,
  STATUS_INTERVAL_MS: 100,
  // Router queue for the display subscriber; it only needs the newest frames
  QUEUE_CAPACITY: 64,
  SUBSCRIBER_NAME: 'display',
} as const;

/** The router surface the feed subscribes through */
export interface FrameSource {
  subscribe(name: string, handler: FrameHandler, options?: SubscribeOptions): () => void;
}

export interface DisplayFeedOptions {
  frameRateHz: number;
  statusIntervalMs: number;
  joystickDeadzone: number;
  status: () => DisplayStatus;
  now: () => number;
}

export interface DisplayFeedStats {
  framesIn: number;
  framesOut: number;
  coalesced: number;
  batches: number;
  statusUpdates: number;
}

function toDisplayFrame(frame: SensorFrame): DisplayFrame {
  return {
    source: frame.source,
    hostMs: frame.timestamp.hostMs,
    sequence: frame.timestamp.sequence,
    values: frame.values,
    units: frame.units,
    valid: frame.valid,
    calibrated: frame.calibrated,
  };
}

export class DisplayFeed extends EventEmitter {
  private latest = new Map<SensorSource, SensorFrame>();
  private frameTimer: NodeJS.Timeout | null = null;
  private statusTimer: NodeJS.Timeout | null = null;
  private detach: (() => void) | null = null;
  private readonly options: DisplayFeedOptions;
  private stats: DisplayFeedStats = { framesIn: 0, framesOut: 0, coalesced: 0, batches: 0, statusUpdates: 0 };

  constructor(options: Partial<DisplayFeedOptions> & Pick<DisplayFeedOptions, 'status'>) {
    super();
    this.options = {
      frameRateHz: DISPLAY_CONFIG.FRAME_RATE_HZ,
      statusIntervalMs: DISPLAY_CONFIG.STATUS_INTERVAL_MS,
      joystickDeadzone: JOYSTICK.DEADZONE,
      now: Date.now,
      ...options,
    };
  }

  isRunning(): boolean {
    return this.frameTimer !== null;
  }

  /**
   * Subscribe to the router and start the display and status ticks.
   */
  start(router: FrameSource): void {
    if (this.isRunning()) return;

    this.detach = router.subscribe(DISPLAY_CONFIG.SUBSCRIBER_NAME, frame => this.handleFrame(frame), {
      capacity: DISPLAY_CONFIG.QUEUE_CAPACITY,
    });

    const frameIntervalMs = Math.round(1000 / this.options.frameRateHz);
    this.frameTimer = setInterval(() => this.flush(), frameIntervalMs);
    this.statusTimer = setInterval(() => this.publishStatus(), this.options.statusIntervalMs);
    log.info(`🖥️ Display feed running (${this.options.frameRateHz} Hz, status every ${this.options.statusIntervalMs}ms)`);
  }

  stop(): void {
    this.detach?.();
    this.detach = null;
    if (this.frameTimer) clearInterval(this.frameTimer);
    if (this.statusTimer) clearInterval(this.statusTimer);
    this.frameTimer = null;
    this.statusTimer = null;
    this.latest.clear();
  }

  handleFrame(frame: SensorFrame): void {
    this.stats.framesIn++;
    if (this.latest.has(frame.source)) this.stats.coalesced++;

    const shown = frame.source === 'joystick' ? applyJoystickDeadzone(frame, this.options.joystickDeadzone) : frame;
    this.latest.set(frame.source, shown);
  }

  /**
   * Emit the frames collected since the last tick, in source order.
   */
  flush(): SensorBatchMessage | null {
    if (this.latest.size === 0) return null;

    const frames: DisplayFrame[] = [];
    for (const source of SENSOR_SOURCES) {
      const frame = this.latest.get(source);
      if (frame) frames.push(toDisplayFrame(frame));
    }
    this.latest.clear();

    const message: SensorBatchMessage = { type: MESSAGE_TYPES.SENSOR_BATCH, timestamp: this.options.now(), frames };
    this.stats.batches++;
    this.stats.framesOut += frames.length;
    this.emit('message', message);
    return message;
  }

  publishStatus(): DeviceStatusMessage {
    const message: DeviceStatusMessage = {
      type: MESSAGE_TYPES.DEVICE_STATUS,
      timestamp: this.options.now(),
      status: this.options.status(),
    };
    this.stats.statusUpdates++;
    this.emit('message', message);
    return message;
  }

  getStats(): DisplayFeedStats {
    return { ...this.stats };
  }
}
