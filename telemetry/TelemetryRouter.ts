/**
 * Telemetry Router
 *
 * Single ingress for decoded glove telemetry, fanned out to independent subscribers.
 * - attach() pumps a session notification channel through decode → transform → publish
 * - publish() is synchronous and O(1) per subscriber (ring buffer push)
 * - each subscriber drains its own queue on its own loop; a stuck handler only fills its own queue
 * - full queue: the subscriber's oldest frame is dropped and counted
 *
 * Events:
 *   'backpressure' ({ subscriber, dropped })  first drop of a run
 *   'decodeError'  (DecodeError, RawNotification)
 */

import { EventEmitter } from 'events';
import { CircularBuffer } from '../shared/CircularBuffer';
import { DecodeError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import { decodeTelemetry } from '../glove-protocol/CharacteristicCodec';
import { isTelemetryKey, type SensorFrame, type SensorSource } from '../glove-protocol/types';
import type { RawNotification } from '../ble-bridge/NotificationChannel';

const log = createLogger('TelemetryRouter');

export const ROUTER_CONFIG = {
  // Per-subscriber queue (~5s of IMU frames at 104 Hz)
  DEFAULT_CAPACITY: 512,
  // Frames handled per drain tick before yielding to the event loop
  MAX_BATCH_SIZE: 50,
} as const;

export type FrameHandler = (frame: SensorFrame) => void | Promise<void>;

/** Applied to every frame before publish (calibration) */
export type FrameTransform = (frame: SensorFrame) => SensorFrame;

export interface SubscribeOptions {
  capacity?: number;
  /** Only these sources; all when omitted */
  sources?: readonly SensorSource[];
}

export interface SubscriberStats {
  capacity: number;
  queued: number;
  delivered: number;
  dropped: number;
  handlerErrors: number;
}

export interface RouterStats {
  published: number;
  decodeErrors: number;
  transformErrors: number;
  subscribers: Record<string, SubscriberStats>;
}

export interface BackpressureEvent {
  subscriber: string;
  dropped: number;
}

interface Subscriber {
  name: string;
  handler: FrameHandler;
  sources: ReadonlySet<SensorSource> | null;
  queue: CircularBuffer<SensorFrame>;
  delivered: number;
  handlerErrors: number;
  inDropRun: boolean;
  draining: boolean;
  scheduled: NodeJS.Immediate | null;
  closed: boolean;
}

export class TelemetryRouter extends EventEmitter {
  private subscribers = new Map<string, Subscriber>();
  private pumps = new Set<Promise<void>>();
  private transform: FrameTransform | null = null;
  private published = 0;
  private decodeErrors = 0;
  private transformErrors = 0;

  // ───────────────────────────────────────────────────────────────────────────
  // Ingress
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Pump a session channel until it closes.
   */
  attach(channel: AsyncIterable<RawNotification>): void {
    const pump = this.pump(channel)
      .catch((error: unknown) => log.error(`Channel pump failed: ${describeError(error)}`))
      .finally(() => this.pumps.delete(pump));
    this.pumps.add(pump);
  }

  /**
   * Resolves once every attached channel has closed and been pumped dry.
   */
  async drained(): Promise<void> {
    await Promise.all(Array.from(this.pumps));
  }

  private async pump(channel: AsyncIterable<RawNotification>): Promise<void> {
    for await (const notification of channel) {
      this.ingest(notification);
    }
  }

  /**
   * Decode one raw notification and publish it. Decode failures are counted, never thrown.
   */
  ingest(notification: RawNotification): void {
    const { key } = notification;
    if (!isTelemetryKey(key)) return;

    let frame: SensorFrame;
    try {
      frame = decodeTelemetry(key, notification.payload, notification.hostMs);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.decodeErrors++;
      log.debug(`Decode error on ${key}: ${error.message}`);
      this.emit('decodeError', error, notification);
      return;
    }

    this.publish(this.applyTransform(frame));
  }

  setTransform(transform: FrameTransform | null): void {
    this.transform = transform;
  }

  private applyTransform(frame: SensorFrame): SensorFrame {
    if (!this.transform) return frame;
    try {
      return this.transform(frame);
    } catch (error) {
      // Publish the uncorrected frame rather than lose it
      this.transformErrors++;
      log.warn(`Transform failed on ${frame.source}: ${describeError(error)}`);
      return frame;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Fan-out
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Hand a frame to every matching subscriber without waiting on any of them.
   */
  publish(frame: SensorFrame): void {
    this.published++;

    for (const subscriber of this.subscribers.values()) {
      if (subscriber.sources && !subscriber.sources.has(frame.source)) continue;

      const wasFull = subscriber.queue.isFull();
      subscriber.queue.push(frame);

      if (wasFull && !subscriber.inDropRun) {
        subscriber.inDropRun = true;
        const event: BackpressureEvent = {
          subscriber: subscriber.name,
          dropped: subscriber.queue.getDroppedCount(),
        };
        log.warn(`⚠️ Subscriber "${subscriber.name}" is falling behind; dropping oldest frames`);
        this.emit('backpressure', event);
      }

      this.scheduleDrain(subscriber);
    }
  }

  /**
   * Register a consumer with its own bounded queue.
   * @returns unsubscribe function
   */
  subscribe(name: string, handler: FrameHandler, options: SubscribeOptions = {}): () => void {
    if (this.subscribers.has(name)) {
      throw new Error(`Subscriber "${name}" already registered`);
    }

    const subscriber: Subscriber = {
      name,
      handler,
      sources: options.sources ? new Set(options.sources) : null,
      queue: new CircularBuffer<SensorFrame>(options.capacity ?? ROUTER_CONFIG.DEFAULT_CAPACITY),
      delivered: 0,
      handlerErrors: 0,
      inDropRun: false,
      draining: false,
      scheduled: null,
      closed: false,
    };
    this.subscribers.set(name, subscriber);

    return () => this.unsubscribe(name);
  }

  unsubscribe(name: string): void {
    const subscriber = this.subscribers.get(name);
    if (!subscriber) return;

    subscriber.closed = true;
    if (subscriber.scheduled) {
      clearImmediate(subscriber.scheduled);
      subscriber.scheduled = null;
    }
    subscriber.queue.clear();
    this.subscribers.delete(name);
  }

  private scheduleDrain(subscriber: Subscriber): void {
    if (subscriber.draining || subscriber.scheduled || subscriber.closed) return;

    subscriber.scheduled = setImmediate(() => {
      subscriber.scheduled = null;
      this.drain(subscriber).catch((error: unknown) => {
        log.error(`Drain loop for "${subscriber.name}" failed: ${describeError(error)}`);
      });
    });
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    subscriber.draining = true;
    try {
      let processed = 0;
      let frame = subscriber.queue.shift();
      while (frame !== undefined && !subscriber.closed) {
        try {
          await subscriber.handler(frame);
          subscriber.delivered++;
        } catch (error) {
          subscriber.handlerErrors++;
          log.warn(`Subscriber "${subscriber.name}" handler failed: ${describeError(error)}`);
        }

        if (++processed >= ROUTER_CONFIG.MAX_BATCH_SIZE) break;
        frame = subscriber.queue.shift();
      }
    } finally {
      subscriber.draining = false;
    }

    if (subscriber.queue.isEmpty()) {
      subscriber.inDropRun = false;
    } else {
      this.scheduleDrain(subscriber);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Stats & teardown
  // ───────────────────────────────────────────────────────────────────────────

  getStats(): RouterStats {
    const subscribers: Record<string, SubscriberStats> = {};
    for (const subscriber of this.subscribers.values()) {
      subscribers[subscriber.name] = {
        capacity: subscriber.queue.capacity,
        queued: subscriber.queue.size(),
        delivered: subscriber.delivered,
        dropped: subscriber.queue.getDroppedCount(),
        handlerErrors: subscriber.handlerErrors,
      };
    }

    return {
      published: this.published,
      decodeErrors: this.decodeErrors,
      transformErrors: this.transformErrors,
      subscribers,
    };
  }

  close(): void {
    Array.from(this.subscribers.keys()).forEach(name => this.unsubscribe(name));
    this.transform = null;
    this.removeAllListeners();
  }
}
