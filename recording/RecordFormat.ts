/**
 * Glove log file format
 *
 *   "GLOG" | u8 version | u32 header length | header JSON (UTF-8)
 *   then records, each: u16 body length | body
 *
 *   body: f64 hostMs | u32 sequence (0xFFFFFFFF = none) | u8 source index |
 *         u8 valid | u8 count | f64 × count
 *
 * All integers little-endian.
 */

import { SENSOR_SOURCES, type SensorFrame, type SensorSource } from '../glove-protocol/types';
import { DecodeError } from '../shared/errors';
import type { LogFile, LogHeader, LogRecord } from './types';

export const LOG_MAGIC = Buffer.from('GLOG', 'ascii');
export const LOG_FORMAT_VERSION = 1;
export const LOG_FILE_EXTENSION = '.glog';

const NO_SEQUENCE = 0xffffffff;
const PREAMBLE_LENGTH = LOG_MAGIC.length + 1 + 4;
const RECORD_FIXED_LENGTH = 8 + 4 + 1 + 1 + 1;

// ============================================================================
// Encoding
// ============================================================================

export function encodeHeader(header: LogHeader): Buffer {
    const json = Buffer.from(JSON.stringify(header), 'utf-8');
    const preamble = Buffer.alloc(PREAMBLE_LENGTH);
    LOG_MAGIC.copy(preamble, 0);
    preamble.writeUInt8(LOG_FORMAT_VERSION, LOG_MAGIC.length);
    preamble.writeUInt32LE(json.length, LOG_MAGIC.length + 1);
    return Buffer.concat([preamble, json]);
}

export function encodeRecord(frame: SensorFrame): Buffer {
    const count = frame.values.length;
    const bodyLength = RECORD_FIXED_LENGTH + count * 8;
    const buffer = Buffer.alloc(2 + bodyLength);

    let offset = buffer.writeUInt16LE(bodyLength, 0);
    offset = buffer.writeDoubleLE(frame.timestamp.hostMs, offset);
    offset = buffer.writeUInt32LE(frame.timestamp.sequence ?? NO_SEQUENCE, offset);
    offset = buffer.writeUInt8(SENSOR_SOURCES.indexOf(frame.source), offset);
    offset = buffer.writeUInt8(frame.valid ? 1 : 0, offset);
    offset = buffer.writeUInt8(count, offset);
    for (const value of frame.values) {
        offset = buffer.writeDoubleLE(value, offset);
    }
    return buffer;
}

// ============================================================================
// Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSource(value: unknown): SensorSource | undefined {
    return SENSOR_SOURCES.find(source => source === value);
}

function parseHeader(json: string): LogHeader {
    const parsed: unknown = JSON.parse(json);
    if (!isRecord(parsed)) throw new DecodeError('log header', 'not an object');

    const source = toSource(parsed.source);
    const { format, sessionId, startedAt, device, units } = parsed;
    if (!source || typeof sessionId !== 'string' || typeof startedAt !== 'string' || typeof format !== 'number') {
        throw new DecodeError('log header', 'missing source, sessionId, startedAt or format');
    }

    let parsedDevice: LogHeader['device'] = null;
    if (isRecord(device) && typeof device.address === 'string' && typeof device.name === 'string') {
        parsedDevice = { address: device.address, name: device.name };
    }

    return {
        format,
        sessionId,
        source,
        startedAt,
        device: parsedDevice,
        units: Array.isArray(units) ? units.filter((u): u is string => typeof u === 'string') : [],
    };
}

function decodeRecord(body: Buffer): LogRecord {
    if (body.length < RECORD_FIXED_LENGTH) {
        throw new DecodeError('log record', `body of ${body.length} bytes`);
    }

    const hostMs = body.readDoubleLE(0);
    const rawSequence = body.readUInt32LE(8);
    const source = SENSOR_SOURCES[body.readUInt8(12)];
    const valid = body.readUInt8(13) === 1;
    const count = body.readUInt8(14);

    if (source === undefined) throw new DecodeError('log record', `source index ${body.readUInt8(12)}`);
    if (body.length !== RECORD_FIXED_LENGTH + count * 8) {
        throw new DecodeError('log record', `expected ${count} values in ${body.length} bytes`);
    }

    const values: number[] = [];
    for (let i = 0; i < count; i++) values.push(body.readDoubleLE(RECORD_FIXED_LENGTH + i * 8));

    return {
        hostMs,
        sequence: rawSequence === NO_SEQUENCE ? null : rawSequence,
        source,
        valid,
        values,
    };
}

/**
 * Parse a whole log file. A partial trailing record (interrupted write) is reported, not thrown.
 */
export function parseLog(data: Buffer): LogFile {
    if (data.length < PREAMBLE_LENGTH || !data.subarray(0, LOG_MAGIC.length).equals(LOG_MAGIC)) {
        throw new DecodeError('log file', 'missing GLOG magic');
    }

    const version = data.readUInt8(LOG_MAGIC.length);
    if (version !== LOG_FORMAT_VERSION) {
        throw new DecodeError('log file', `unsupported format version ${version}`);
    }

    const headerLength = data.readUInt32LE(LOG_MAGIC.length + 1);
    const headerEnd = PREAMBLE_LENGTH + headerLength;
    if (headerEnd > data.length) throw new DecodeError('log file', 'header truncated');

    const header = parseHeader(data.subarray(PREAMBLE_LENGTH, headerEnd).toString('utf-8'));

    const records: LogRecord[] = [];
    let offset = headerEnd;
    let truncated = false;

    while (offset < data.length) {
        if (offset + 2 > data.length) {
            truncated = true;
            break;
        }
        const bodyLength = data.readUInt16LE(offset);
        const bodyEnd = offset + 2 + bodyLength;
        if (bodyEnd > data.length) {
            truncated = true;
            break;
        }
        records.push(decodeRecord(data.subarray(offset + 2, bodyEnd)));
        offset = bodyEnd;
    }

    return { header, records, truncated };
}
