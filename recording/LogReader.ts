import * as fs from 'fs';
import * as path from 'path';
import type { SensorSource } from '../glove-protocol/types';
import { parseLog, LOG_FILE_EXTENSION } from './RecordFormat';
import type { LogFile } from './types';

/**
 * Read and parse one log file.
 */
export async function readLogFile(filePath: string): Promise<LogFile> {
    return parseLog(await fs.promises.readFile(filePath));
}

/**
 * Read every log file of a session directory, keyed by source.
 */
export async function readSessionLogs(directory: string): Promise<Partial<Record<SensorSource, LogFile>>> {
    const entries = await fs.promises.readdir(directory);
    const logs: Partial<Record<SensorSource, LogFile>> = {};

    for (const entry of entries.filter(name => name.endsWith(LOG_FILE_EXTENSION)).sort()) {
        const file = await readLogFile(path.join(directory, entry));
        logs[file.header.source] = file;
    }
    return logs;
}
