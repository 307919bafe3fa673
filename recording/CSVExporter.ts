import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../shared/Logger';
import { parseLog } from './RecordFormat';
import type { LogFile } from './types';

const log = createLogger('CSVExporter');

/** Export options. */
export interface ExportOptions {
    includeMetadata?: boolean;
    /** Output directory; defaults to the log file's directory */
    outputPath?: string;
    /** Skip records flagged invalid */
    validOnly?: boolean;
}

/** Export result. */
export interface ExportResult {
    success: boolean;
    filePath?: string;
    fileName?: string;
    error?: string;
    sampleCount?: number;
}

/**
 * Converts glove log files to CSV.
 */
export class CSVExporter {

    /**
     * Export one .glog file to a .csv beside it (or into outputPath).
     */
    static exportLogFile(logPath: string, options: ExportOptions = {}): ExportResult {
        const { includeMetadata = true, outputPath, validOnly = false } = options;

        let file: LogFile;
        try {
            file = parseLog(fs.readFileSync(logPath));
        } catch (err) {
            log.error(`❌ Cannot read ${logPath}: ${err}`);
            return { success: false, error: `Failed to read log: ${err}` };
        }

        const records = validOnly ? file.records.filter(record => record.valid) : file.records;
        if (records.length === 0) {
            return { success: false, error: 'No records to export' };
        }

        const csvContent = CSVExporter.generateCSVContent({ ...file, records }, includeMetadata);

        const fileName = `${path.basename(logPath, path.extname(logPath))}.csv`;
        const directory = outputPath ?? path.dirname(logPath);
        const filePath = path.join(directory, fileName);

        if (!fs.existsSync(directory)) {
            fs.mkdirSync(directory, { recursive: true });
        }

        try {
            fs.writeFileSync(filePath, csvContent, 'utf-8');
            log.info(`📤 Exported ${records.length} ${file.header.source} records to ${filePath}`);
            return {
                success: true,
                filePath,
                fileName,
                sampleCount: records.length
            };
        } catch (err) {
            return {
                success: false,
                error: `Failed to write file: ${err}`
            };
        }
    }

    /**
     * Generate CSV content string.
     */
    static generateCSVContent(file: LogFile, includeMetadata: boolean = true): string {
        const lines: string[] = [];
        const { header, records } = file;

        if (includeMetadata) {
            lines.push('# Glove sensor log');
            lines.push(`# Session: ${header.sessionId}`);
            lines.push(`# Source: ${header.source}`);
            lines.push(`# Started: ${header.startedAt}`);
            if (header.device) {
                lines.push(`# Device: ${header.device.name} (${header.device.address})`);
            }
            lines.push(`# Records: ${records.length}`);
            if (file.truncated) {
                lines.push('# Truncated: true');
            }
        }

        const width = Math.max(header.units.length, ...records.map(record => record.values.length));
        lines.push(CSVExporter.columnNames(header.units, width).join(','));

        for (const record of records) {
            const values = Array.from({ length: width }, (_, i) => {
                const value = record.values[i];
                return value === undefined ? '' : String(value);
            });
            lines.push([
                record.hostMs.toFixed(3),
                record.sequence ?? '',
                record.valid ? 1 : 0,
                ...values
            ].join(','));
        }

        return lines.join('\n') + '\n';
    }

    private static columnNames(units: readonly string[], width: number): string[] {
        const columns = ['host_ms', 'sequence', 'valid'];
        for (let i = 0; i < width; i++) {
            const unit = units[i];
            columns.push(unit ? `v${i}_${unit.replace(/[^A-Za-z0-9%]/g, '')}` : `v${i}`);
        }
        return columns;
    }
}
