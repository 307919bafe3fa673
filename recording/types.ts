/**
 * Types for recording module.
 */

import type { SensorSource } from '../glove-protocol/types';

// ============================================================================
// Log file
// ============================================================================

/** JSON header at the start of every log file. */
export interface LogHeader {
    format: number;
    sessionId: string;
    source: SensorSource;
    startedAt: string;       // ISO-8601, shared by every stream of the session
    device: { address: string; name: string } | null;
    units: readonly string[];
}

/** One decoded record. */
export interface LogRecord {
    hostMs: number;
    sequence: number | null;
    source: SensorSource;
    valid: boolean;
    values: number[];
}

export interface LogFile {
    header: LogHeader;
    records: LogRecord[];
    /** Trailing bytes that did not form a complete record */
    truncated: boolean;
}

// ============================================================================
// Streams
// ============================================================================

export type LogStreamState = 'active' | 'degraded' | 'closed';

export interface LogStreamOptions {
    /** Records held in memory while the sink is slow or failing */
    capacity: number;
    /** Retry interval while degraded */
    retryIntervalMs: number;
    /** Records per sink write */
    batchSize: number;
}

export interface StreamStats {
    source: SensorSource;
    path: string;
    state: LogStreamState;
    records: number;         // written to the sink
    bytes: number;           // write cursor
    pending: number;
    dropped: number;         // evicted from the pending buffer
    refused: number;         // out-of-order timestamps
    lastHostMs: number | null;
}

export interface StreamSummary extends StreamStats {
    /** Pending records that could not be written before close */
    lost: number;
}

// ============================================================================
// Logger session
// ============================================================================

export interface LoggerStartOptions {
    directory: string;
    sources: readonly SensorSource[];
    device?: { address: string; name: string } | null;
}

export interface LoggerSessionInfo {
    sessionId: string;
    stamp: string;
    directory: string;
    files: Partial<Record<SensorSource, string>>;
}
