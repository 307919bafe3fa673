/**
 * BLE Connection Logger
 * Connection-phase helpers on top of the scoped application logger
 */

import { createLogger, type Logger } from '../shared/Logger';
import { describeError } from '../shared/errors';

type Category = 'BLE' | 'CONNECTION' | 'NOBLE' | 'PERIPHERAL';

class BleLogger {
  private readonly scopes = new Map<Category, Logger>();

  private scope(category: Category): Logger {
    let logger = this.scopes.get(category);
    if (!logger) {
      logger = createLogger(category === 'BLE' ? 'BLE' : `BLE:${category}`);
      this.scopes.set(category, logger);
    }
    return logger;
  }

  info(message: string, data?: unknown, category: Category = 'BLE'): void {
    if (data === undefined) this.scope(category).info(message);
    else this.scope(category).info(message, data);
  }

  warn(message: string, data?: unknown, category: Category = 'BLE'): void {
    if (data === undefined) this.scope(category).warn(message);
    else this.scope(category).warn(message, data);
  }

  error(message: string, data?: unknown, category: Category = 'BLE'): void {
    if (data === undefined) this.scope(category).error(message);
    else this.scope(category).error(message, data);
  }

  debug(message: string, data?: unknown, category: Category = 'BLE'): void {
    if (data === undefined) this.scope(category).debug(message);
    else this.scope(category).debug(message, data);
  }

  // Connection-specific logging
  logConnection(deviceId: string, deviceName: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${deviceName} (${deviceId})`, details, 'CONNECTION');
  }

  logConnectionError(deviceId: string, deviceName: string, phase: string, error: unknown): void {
    this.error(
      `${phase} FAILED - ${deviceName} (${deviceId})`,
      {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'CONNECTION'
    );
  }

  // Noble event logging
  logNobleEvent(eventName: string, details?: unknown): void {
    this.info(`Noble event: ${eventName}`, details, 'NOBLE');
  }

  // Peripheral state logging
  logPeripheralState(deviceId: string, state: string, details?: Record<string, unknown>): void {
    this.info(`Peripheral state: ${state}`, { deviceId, ...details }, 'PERIPHERAL');
  }
}

export const bleLogger = new BleLogger();
