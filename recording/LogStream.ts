/**
 * LogStream - one source's log file
 *
 * enqueue() never waits on I/O: records go into a bounded pending buffer and a
 * single drain loop writes them in batches. A failing sink moves the stream to
 * 'degraded'; the loop retries on a timer and returns to 'active' once a batch
 * lands. When the buffer overflows the oldest pending records are dropped.
 *
 * Events:
 *   'degraded'  (WriteFailureError)
 *   'recovered' ()
 */

import { EventEmitter } from 'events';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import { CircularBuffer } from '../shared/CircularBuffer';
import { WriteFailureError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import type { LogSink } from './LogSink';
import { encodeHeader, encodeRecord } from './RecordFormat';
import type { LogHeader, LogStreamOptions, LogStreamState, StreamStats, StreamSummary } from './types';

const log = createLogger('LogStream');

export const LOG_STREAM_DEFAULTS: LogStreamOptions = {
    capacity: 4096,
    retryIntervalMs: 1000,
    batchSize: 256,
};

interface Waiter {
    resolve: () => void;
    reject: (error: WriteFailureError) => void;
}

export class LogStream extends EventEmitter {
    private state: LogStreamState = 'active';
    private readonly pending: CircularBuffer<Buffer>;
    private readonly options: LogStreamOptions;

    private draining: Promise<void> | null = null;
    private retryTimer: NodeJS.Timeout | null = null;
    private waiters: Waiter[] = [];
    private lastError: WriteFailureError | null = null;

    private inFlight = 0;
    private evictedInFlight = 0;
    // A failed write may have left part of its batch on disk
    private needsRewind = false;

    private records = 0;
    private bytes = 0;
    private dropped = 0;
    private refused = 0;
    private lastHostMs: number | null = null;

    constructor(
        readonly source: SensorSource,
        private readonly sink: LogSink,
        options: Partial<LogStreamOptions> = {}
    ) {
        super();
        this.options = { ...LOG_STREAM_DEFAULTS, ...options };
        this.pending = new CircularBuffer<Buffer>(this.options.capacity);
    }

    get path(): string {
        return this.sink.path;
    }

    getState(): LogStreamState {
        return this.state;
    }

    /**
     * Create the file and write its header.
     */
    async open(header: LogHeader): Promise<void> {
        await this.sink.open();
        const bytes = encodeHeader(header);
        await this.sink.write(bytes);
        this.bytes += bytes.length;
    }

    // ============================================================================
    // Appending
    // ============================================================================

    /**
     * Queue a frame without waiting for the write.
     * @returns false when the stream is closed or the timestamp is before the last accepted one
     */
    enqueue(frame: SensorFrame): boolean {
        if (this.state === 'closed') return false;

        const hostMs = frame.timestamp.hostMs;
        if (this.lastHostMs !== null && hostMs < this.lastHostMs) {
            this.refused++;
            return false;
        }
        this.lastHostMs = hostMs;

        const evicted = this.pending.push(encodeRecord(frame));
        if (evicted !== undefined) {
            if (this.inFlight > this.evictedInFlight) {
                this.evictedInFlight++;
            } else {
                this.dropped++;
            }
        }

        if (this.state === 'active') this.kick();
        return true;
    }

    /**
     * Queue a frame and wait until it (and everything before it) is written.
     */
    async append(frame: SensorFrame): Promise<boolean> {
        const accepted = this.enqueue(frame);
        if (accepted) await this.flush();
        return accepted;
    }

    /**
     * Resolve once the pending buffer is empty.
     * @throws WriteFailureError while the stream is degraded
     */
    flush(): Promise<void> {
        if (this.pending.isEmpty() && !this.draining) return Promise.resolve();
        if (this.state === 'degraded' && this.lastError) return Promise.reject(this.lastError);

        return new Promise<void>((resolve, reject) => {
            this.waiters.push({ resolve, reject });
            this.kick();
        });
    }

    // ============================================================================
    // Drain loop
    // ============================================================================

    private kick(): void {
        if (this.draining || this.state === 'closed') return;
        this.draining = this.drain();
    }

    private async drain(): Promise<void> {
        try {
            while (!this.pending.isEmpty()) {
                await this.writeBatch();
            }

            if (this.state === 'degraded') {
                this.state = 'active';
                this.lastError = null;
                log.info(`✅ Log stream ${this.source} recovered`);
                this.emit('recovered');
            }
            this.settleWaiters(null);
        } catch (error) {
            this.onWriteFailure(new WriteFailureError(this.source, error));
        } finally {
            this.draining = null;
        }
    }

    private async writeBatch(): Promise<void> {
        const batch = this.pending.toArray().slice(0, this.options.batchSize);
        const data = Buffer.concat(batch);

        this.inFlight = batch.length;
        this.evictedInFlight = 0;
        try {
            if (this.needsRewind) {
                await this.sink.truncate(this.bytes);
                this.needsRewind = false;
            }
            await this.sink.write(data);
        } catch (error) {
            this.needsRewind = true;
            // Evicted records from the failed batch are gone for good
            this.dropped += this.evictedInFlight;
            throw error;
        } finally {
            this.inFlight = 0;
        }

        // Records evicted during the write already left the buffer
        for (let i = this.evictedInFlight; i < batch.length; i++) this.pending.shift();
        this.evictedInFlight = 0;

        this.records += batch.length;
        this.bytes += data.length;
    }

    private onWriteFailure(failure: WriteFailureError): void {
        this.lastError = failure;
        if (this.state === 'active') {
            this.state = 'degraded';
            log.warn(`⚠️ Log stream ${this.source} degraded: ${describeError(failure.ioError)}`);
            this.emit('degraded', failure);
        }
        this.settleWaiters(failure);
        this.scheduleRetry();
    }

    private scheduleRetry(): void {
        if (this.retryTimer || this.state !== 'degraded') return;
        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.kick();
        }, this.options.retryIntervalMs);
    }

    private settleWaiters(error: WriteFailureError | null): void {
        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach(waiter => (error ? waiter.reject(error) : waiter.resolve()));
    }

    // ============================================================================
    // Shutdown
    // ============================================================================

    /**
     * Final drain attempt, then close the sink. Records still pending are counted as lost.
     */
    async close(): Promise<StreamSummary> {
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }
        if (this.draining) await this.draining;

        if (this.state !== 'closed' && !this.pending.isEmpty()) {
            try {
                while (!this.pending.isEmpty()) await this.writeBatch();
            } catch (error) {
                log.warn(`Final drain of ${this.source} failed: ${describeError(error)}`);
            }
        }

        if (this.needsRewind) {
            try {
                await this.sink.truncate(this.bytes);
                this.needsRewind = false;
            } catch (error) {
                log.warn(`Dropping the partial tail of ${this.path} failed: ${describeError(error)}`);
            }
        }

        const lost = this.pending.size();
        this.pending.clear();
        this.state = 'closed';
        this.settleWaiters(lost > 0 ? this.lastError ?? new WriteFailureError(this.source, 'closed') : null);

        try {
            await this.sink.close();
        } catch (error) {
            log.warn(`Closing ${this.path} failed: ${describeError(error)}`);
        }

        if (lost > 0) log.warn(`⚠️ ${lost} ${this.source} record(s) lost at close`);
        return { ...this.getStats(), lost };
    }

    /**
     * Close and delete the file.
     */
    async discard(): Promise<void> {
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }
        this.state = 'closed';
        this.pending.clear();
        await this.sink.remove();
    }

    getStats(): StreamStats {
        return {
            source: this.source,
            path: this.path,
            state: this.state,
            records: this.records,
            bytes: this.bytes,
            pending: this.pending.size(),
            dropped: this.dropped,
            refused: this.refused,
            lastHostMs: this.lastHostMs,
        };
    }
}
