export { ConcurrentLogger, formatStamp } from './ConcurrentLogger';
export type { ConcurrentLoggerOptions } from './ConcurrentLogger';
export { LogStream, LOG_STREAM_DEFAULTS } from './LogStream';
export { FileLogSink, fileSinkFactory } from './LogSink';
export type { LogSink, LogSinkFactory } from './LogSink';
export { encodeHeader, encodeRecord, parseLog, LOG_FILE_EXTENSION, LOG_FORMAT_VERSION } from './RecordFormat';
export { readLogFile, readSessionLogs } from './LogReader';
export { CSVExporter } from './CSVExporter';
export type { ExportOptions, ExportResult } from './CSVExporter';
export * from './types';
