/**
 * Glove host error taxonomy
 * Every failure the core reports is one of these classes, identified by a stable code
 */

export type GloveErrorCode =
  | 'CONNECT_TIMEOUT'
  | 'DEVICE_UNREACHABLE'
  | 'CONNECTION_LOST'
  | 'DECODE_ERROR'
  | 'INVALID_CONFIG'
  | 'WRITE_REJECTED'
  | 'INSUFFICIENT_SAMPLES'
  | 'DRIFT_EXCEEDED'
  | 'WRITE_FAILURE'
  | 'DEVICE_BUSY'
  | 'OPERATION_CANCELLED'
  | 'GATT_TIMEOUT'
  | 'INVALID_TRANSITION'
  | 'LOGGER_STATE';

export abstract class GloveError extends Error {
  abstract readonly code: GloveErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

export class ConnectTimeoutError extends GloveError {
  readonly code = 'CONNECT_TIMEOUT';

  constructor(
    public readonly deviceId: string,
    public readonly timeoutMs: number
  ) {
    super(`Connection to ${deviceId} timed out after ${timeoutMs}ms`);
  }
}

export class DeviceUnreachableError extends GloveError {
  readonly code = 'DEVICE_UNREACHABLE';

  constructor(
    public readonly deviceId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Device ${deviceId} unreachable: ${reason}`, options);
  }
}

export class ConnectionLostError extends GloveError {
  readonly code = 'CONNECTION_LOST';

  constructor(
    public readonly deviceId: string,
    public readonly attempts: number
  ) {
    super(`Connection to ${deviceId} lost after ${attempts} reconnect attempts`);
  }
}

export class OperationCancelledError extends GloveError {
  readonly code = 'OPERATION_CANCELLED';

  constructor(public readonly operation: string) {
    super(`${operation} cancelled`);
  }
}

export class GattTimeoutError extends GloveError {
  readonly code = 'GATT_TIMEOUT';

  constructor(
    public readonly operationId: string,
    public readonly timeoutMs: number
  ) {
    super(`GATT operation timeout after ${timeoutMs}ms: ${operationId}`);
  }
}

export class InvalidTransitionError extends GloveError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    public readonly fromState: string,
    public readonly toState: string
  ) {
    super(`Invalid session transition: ${fromState} → ${toState}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Codec & configuration
// ─────────────────────────────────────────────────────────────────────────────

export class DecodeError extends GloveError {
  readonly code = 'DECODE_ERROR';

  constructor(
    public readonly characteristic: string,
    reason: string
  ) {
    super(`Cannot decode ${characteristic}: ${reason}`);
  }
}

export class InvalidConfigError extends GloveError {
  readonly code = 'INVALID_CONFIG';

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    allowed?: readonly number[]
  ) {
    super(
      allowed
        ? `Invalid ${field}: ${String(value)} (allowed: ${allowed.join(', ')})`
        : `Invalid ${field}: ${String(value)}`
    );
  }
}

export class WriteRejectedError extends GloveError {
  readonly code = 'WRITE_REJECTED';

  constructor(
    public readonly characteristic: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Device rejected write to ${characteristic}: ${reason}`, options);
  }
}

export class DeviceBusyError extends GloveError {
  readonly code = 'DEVICE_BUSY';

  constructor(public readonly characteristic: string) {
    super(`A write to ${characteristic} is already in flight`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Calibration
// ─────────────────────────────────────────────────────────────────────────────

export class InsufficientSamplesError extends GloveError {
  readonly code = 'INSUFFICIENT_SAMPLES';

  constructor(
    public readonly source: string,
    public readonly received: number,
    public readonly required: number
  ) {
    super(`Calibration of ${source} received ${received} samples, need at least ${required}`);
  }
}

/** Advisory only: delivered through the calibration engine's `driftExceeded` event. */
export class DriftExceededError extends GloveError {
  readonly code = 'DRIFT_EXCEEDED';

  constructor(
    public readonly source: string,
    public readonly drift: readonly number[],
    public readonly limit: readonly number[]
  ) {
    super(`Drift on ${source} exceeds 1% of full scale`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export class WriteFailureError extends GloveError {
  readonly code = 'WRITE_FAILURE';

  constructor(
    public readonly stream: string,
    public readonly ioError: unknown
  ) {
    super(`Write to log stream ${stream} failed: ${describeError(ioError)}`, { cause: ioError });
  }
}

export class LoggerStateError extends GloveError {
  readonly code = 'LOGGER_STATE';

  constructor(public readonly reason: string) {
    super(`Logger ${reason}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
