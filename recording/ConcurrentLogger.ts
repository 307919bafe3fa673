/**
 * ConcurrentLogger - one log file per sensor source, written independently
 *
 * Every stream of a session shares the session id and start stamp:
 *   <directory>/<stamp>_<sessionId>/<stamp>_<sessionId>_<source>.glog
 *
 * A slow or failing stream never holds up the others (see LogStream).
 *
 * Events:
 *   'streamDegraded'  (source, WriteFailureError)
 *   'streamRecovered' (source)
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { unitsOfSource } from '../glove-protocol/CharacteristicCodec';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import { LoggerStateError, WriteFailureError, describeError } from '../shared/errors';
import { createLogger } from '../shared/Logger';
import { fileSinkFactory, type LogSinkFactory } from './LogSink';
import { LogStream } from './LogStream';
import { LOG_FILE_EXTENSION, LOG_FORMAT_VERSION } from './RecordFormat';
import type {
    LogHeader,
    LoggerSessionInfo,
    LoggerStartOptions,
    LogStreamOptions,
    StreamStats,
    StreamSummary,
} from './types';

const log = createLogger('ConcurrentLogger');

export interface ConcurrentLoggerOptions {
    stream?: Partial<LogStreamOptions>;
    sinkFactory?: LogSinkFactory;
    now?: () => Date;
}

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

/** YYYYMMDD-HHmmss (UTC) */
export function formatStamp(date: Date): string {
    return (
        `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
    );
}

export class ConcurrentLogger extends EventEmitter {
    private streams = new Map<SensorSource, LogStream>();
    private session: LoggerSessionInfo | null = null;
    private starting = false;

    private readonly sinkFactory: LogSinkFactory;
    private readonly streamOptions: Partial<LogStreamOptions>;
    private readonly now: () => Date;

    constructor(options: ConcurrentLoggerOptions = {}) {
        super();
        this.sinkFactory = options.sinkFactory ?? fileSinkFactory;
        this.streamOptions = options.stream ?? {};
        this.now = options.now ?? (() => new Date());
    }

    isActive(): boolean {
        return this.session !== null;
    }

    getSession(): LoggerSessionInfo | null {
        return this.session;
    }

    isLogging(source: SensorSource): boolean {
        return this.streams.has(source);
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Start / stop
    // ───────────────────────────────────────────────────────────────────────────

    /**
     * Open one stream per source. If any stream fails to open, the ones already
     * opened are removed and nothing is left running.
     */
    async start(options: LoggerStartOptions): Promise<LoggerSessionInfo> {
        if (this.session || this.starting) {
            throw new LoggerStateError('is already running');
        }
        const sources = Array.from(new Set(options.sources));
        if (sources.length === 0) {
            throw new LoggerStateError('needs at least one source');
        }

        this.starting = true;
        try {
            const startedAt = this.now();
            const sessionId = uuidv4();
            const stamp = formatStamp(startedAt);
            const directory = path.join(options.directory, `${stamp}_${sessionId}`);
            await fs.promises.mkdir(directory, { recursive: true });

            const streams = sources.map(
                source =>
                    new LogStream(
                        source,
                        this.sinkFactory(path.join(directory, `${stamp}_${sessionId}_${source}${LOG_FILE_EXTENSION}`)),
                        this.streamOptions
                    )
            );

            const results = await Promise.allSettled(
                streams.map(stream => {
                    const header: LogHeader = {
                        format: LOG_FORMAT_VERSION,
                        sessionId,
                        source: stream.source,
                        startedAt: startedAt.toISOString(),
                        device: options.device ?? null,
                        units: unitsOfSource(stream.source),
                    };
                    return stream.open(header);
                })
            );

            const failedIndex = results.findIndex(result => result.status === 'rejected');
            const failed = results[failedIndex];
            if (failed && failed.status === 'rejected') {
                await this.rollback(streams);
                throw new WriteFailureError(streams[failedIndex].source, failed.reason);
            }

            const files: LoggerSessionInfo['files'] = {};
            for (const stream of streams) {
                this.attach(stream);
                files[stream.source] = stream.path;
            }

            this.session = { sessionId, stamp, directory, files };
            log.info(`🔴 Logging ${sources.join(', ')} to ${directory}`);
            return this.session;
        } finally {
            this.starting = false;
        }
    }

    private attach(stream: LogStream): void {
        stream.on('degraded', (error: WriteFailureError) => this.emit('streamDegraded', stream.source, error));
        stream.on('recovered', () => this.emit('streamRecovered', stream.source));
        this.streams.set(stream.source, stream);
    }

    private async rollback(streams: readonly LogStream[]): Promise<void> {
        await Promise.all(
            streams.map(async stream => {
                try {
                    await stream.discard();
                } catch (error) {
                    log.warn(`Rollback of ${stream.path} failed: ${describeError(error)}`);
                }
            })
        );
    }

    /**
     * Close every stream and report per-source totals.
     */
    async stop(): Promise<StreamSummary[]> {
        if (!this.session) {
            throw new LoggerStateError('is not running');
        }

        const streams = Array.from(this.streams.values());
        this.streams.clear();
        const session = this.session;
        this.session = null;

        const summaries = await Promise.all(streams.map(stream => stream.close()));
        streams.forEach(stream => stream.removeAllListeners());

        const records = summaries.reduce((sum, summary) => sum + summary.records, 0);
        log.info(`⏹️ Logging stopped (${session.sessionId}): ${records} records written`);
        return summaries;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Frames
    // ───────────────────────────────────────────────────────────────────────────

    /**
     * Live path: queue a frame for its source's stream.
     * @returns false when the source is not being logged or the frame was refused
     */
    enqueue(frame: SensorFrame): boolean {
        const stream = this.streams.get(frame.source);
        return stream ? stream.enqueue(frame) : false;
    }

    /**
     * Queue a frame and wait for its write.
     * @throws WriteFailureError while that source's stream is degraded
     */
    async append(frame: SensorFrame): Promise<boolean> {
        const stream = this.streams.get(frame.source);
        return stream ? stream.append(frame) : false;
    }

    async flush(): Promise<void> {
        await Promise.all(Array.from(this.streams.values()).map(stream => stream.flush()));
    }

    getStats(): StreamStats[] {
        return Array.from(this.streams.values()).map(stream => stream.getStats());
    }
}
