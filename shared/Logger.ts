/**
 * Application logger
 * electron-log (Node entry) configured once; modules take a scoped logger
 */

import log from 'electron-log/node';
import type { LevelOption, LogFunctions } from 'electron-log';

export type Logger = LogFunctions;

export interface LoggerOptions {
  level: LevelOption;
  filePath: string | null;
}

const isTestRun = process.env.NODE_ENV === 'test';

log.transports.file.level = isTestRun ? false : 'debug';
log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB max file size
log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}';
log.transports.console.level = isTestRun ? false : 'info';
log.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}] {scope} {text}';

/**
 * Apply runtime logging options (from host/config.ts).
 */
export function configureLogging(options: LoggerOptions): void {
  log.transports.console.level = isTestRun ? false : options.level;

  if (isTestRun) return;

  log.transports.file.level = options.level;
  const { filePath } = options;
  if (filePath) {
    log.transports.file.resolvePathFn = () => filePath;
  }
}

export function createLogger(scope: string): Logger {
  return log.scope(scope);
}

export function getLogFilePath(): string | null {
  if (log.transports.file.level === false) return null;
  return log.transports.file.getFile().path;
}
