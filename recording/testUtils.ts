import { buildFrame } from '../glove-protocol/CharacteristicCodec';
import type { SensorFrame, SensorSource } from '../glove-protocol/types';
import type { LogSink } from './LogSink';

export function frame(source: SensorSource, hostMs: number, values: number[] = [hostMs, 0.5]): SensorFrame {
    return buildFrame(source, hostMs, hostMs, values, values.map(() => 'u'), true);
}

/**
 * In-memory sink; writes can be made to fail or to hang until released.
 */
export class MemorySink implements LogSink {
    chunks: Buffer[] = [];
    opened = false;
    closed = false;
    removed = false;
    failing = false;
    failOpen = false;
    /** Next write stores only this many bytes, then throws */
    partialWriteBytes: number | null = null;
    private held: Array<() => void> = [];
    holdWrites = false;

    constructor(readonly path: string) {}

    async open(): Promise<void> {
        if (this.failOpen) throw new Error('permission denied');
        this.opened = true;
    }

    async write(data: Buffer): Promise<void> {
        if (this.holdWrites) {
            await new Promise<void>(resolve => this.held.push(resolve));
        }
        if (this.failing) throw new Error('disk full');
        if (this.partialWriteBytes !== null) {
            this.chunks.push(data.subarray(0, this.partialWriteBytes));
            this.partialWriteBytes = null;
            throw new Error('no space left on device');
        }
        this.chunks.push(data);
    }

    async truncate(length: number): Promise<void> {
        this.chunks = [this.contents().subarray(0, length)];
    }

    release(): void {
        this.holdWrites = false;
        const held = this.held;
        this.held = [];
        held.forEach(resolve => resolve());
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    async remove(): Promise<void> {
        this.closed = true;
        this.removed = true;
    }

    contents(): Buffer {
        return Buffer.concat(this.chunks);
    }
}

export const settle = () => new Promise<void>(resolve => setImmediate(resolve));
