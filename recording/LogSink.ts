import * as fs from 'fs';

/**
 * Byte destination of one log stream.
 */
export interface LogSink {
    readonly path: string;
    /** Create the destination; fails if it already exists */
    open(): Promise<void>;
    write(data: Buffer): Promise<void>;
    /** Cut the destination back to `length` bytes (drops a partial write) */
    truncate(length: number): Promise<void>;
    close(): Promise<void>;
    /** Close and delete (used to roll back a failed start) */
    remove(): Promise<void>;
}

export type LogSinkFactory = (path: string) => LogSink;

/**
 * Append-only file sink.
 */
export class FileLogSink implements LogSink {
    private handle: fs.promises.FileHandle | null = null;

    constructor(readonly path: string) {}

    async open(): Promise<void> {
        // O_APPEND: every write lands at the current end, also after a truncate
        this.handle = await fs.promises.open(this.path, 'ax');
    }

    async write(data: Buffer): Promise<void> {
        await this.requireHandle().appendFile(data);
    }

    async truncate(length: number): Promise<void> {
        await this.requireHandle().truncate(length);
    }

    private requireHandle(): fs.promises.FileHandle {
        if (!this.handle) {
            throw new Error(`${this.path} is not open`);
        }
        return this.handle;
    }

    async close(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        if (handle) await handle.close();
    }

    async remove(): Promise<void> {
        await this.close();
        await fs.promises.rm(this.path, { force: true });
    }
}

export const fileSinkFactory: LogSinkFactory = path => new FileLogSink(path);
