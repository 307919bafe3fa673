import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildFrame } from '../glove-protocol/CharacteristicCodec';
import { CSVExporter } from './CSVExporter';
import { encodeHeader, encodeRecord } from './RecordFormat';
import type { LogHeader } from './types';

const header: LogHeader = {
    format: 1,
    sessionId: 'session-1',
    source: 'battery',
    startedAt: '2026-03-01T12:00:00.000Z',
    device: { address: 'aa:bb:cc:dd:ee:01', name: 'VR-Glove-01' },
    units: ['%'],
};

describe('CSVExporter', () => {
    let directory: string;
    let logPath: string;

    beforeEach(async () => {
        directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'glove-csv-'));
        logPath = path.join(directory, 'battery.glog');
    });

    afterEach(async () => {
        await fs.promises.rm(directory, { recursive: true, force: true });
    });

    function writeLog(valid: boolean[]): void {
        const records = [
            encodeRecord(buildFrame('battery', 10, null, [80], ['%'], valid[0])),
            encodeRecord(buildFrame('battery', 20.5, 3, [79], ['%'], valid[1])),
        ];
        fs.writeFileSync(logPath, Buffer.concat([encodeHeader(header), ...records]));
    }

    test('should write one row per record beside the log', () => {
        writeLog([true, false]);

        const result = CSVExporter.exportLogFile(logPath);

        expect(result).toEqual({
            success: true,
            filePath: path.join(directory, 'battery.csv'),
            fileName: 'battery.csv',
            sampleCount: 2,
        });
        const lines = fs.readFileSync(path.join(directory, 'battery.csv'), 'utf-8').split('\n');
        expect(lines).toEqual([
            '# Glove sensor log',
            '# Session: session-1',
            '# Source: battery',
            '# Started: 2026-03-01T12:00:00.000Z',
            '# Device: VR-Glove-01 (aa:bb:cc:dd:ee:01)',
            '# Records: 2',
            'host_ms,sequence,valid,v0_%',
            '10.000,,1,80',
            '20.500,3,0,79',
            '',
        ]);
    });

    test('should keep only valid records into another directory', () => {
        writeLog([true, false]);
        const outputPath = path.join(directory, 'exports');

        const result = CSVExporter.exportLogFile(logPath, { outputPath, validOnly: true, includeMetadata: false });

        expect(result.sampleCount).toBe(1);
        expect(fs.readFileSync(path.join(outputPath, 'battery.csv'), 'utf-8')).toBe(
            'host_ms,sequence,valid,v0_%\n10.000,,1,80\n'
        );
    });

    test('should report an error when nothing is left to export', () => {
        writeLog([false, false]);

        expect(CSVExporter.exportLogFile(logPath, { validOnly: true })).toEqual({
            success: false,
            error: 'No records to export',
        });
    });

    test('should report an unreadable log', () => {
        fs.writeFileSync(logPath, 'not a log');

        const result = CSVExporter.exportLogFile(logPath);

        expect(result.success).toBe(false);
        expect(result.error).toMatch(/^Failed to read log: /);
    });
});
