/**
 * GATT Operation Queue
 * Serializes reads/writes/subscribes on one session so only one GATT operation is in flight.
 */

import { GattTimeoutError } from '../shared/errors';
import { GATT_CONFIG } from './BleBridgeConstants';

interface QueuedOperation {
  id: string;
  priority: number; // Higher = more important
  timeoutMs: number;
  execute: () => Promise<void>;
  fail: (error: Error) => void;
}

export interface QueueOptions {
  priority?: number;
  timeoutMs?: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class GattOperationQueue {
  private queue: QueuedOperation[] = [];
  private active: QueuedOperation | null = null;
  private activeTimeout: NodeJS.Timeout | null = null;
  private sequence = 0;

  constructor(private readonly label: string) {}

  /**
   * Queue a GATT operation; resolves with the operation's result once it has run.
   */
  enqueue<T>(operationType: string, operation: () => Promise<T>, options: QueueOptions = {}): Promise<T> {
    const id = `${this.label}_${operationType}_${++this.sequence}`;

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const queued: QueuedOperation = {
        id,
        priority: options.priority ?? 1,
        timeoutMs: options.timeoutMs ?? GATT_CONFIG.OPERATION_TIMEOUT,
        execute: async () => {
          const result = await operation();
          if (!settled) {
            settled = true;
            resolve(result);
          }
        },
        fail: (error: Error) => {
          if (!settled) {
            settled = true;
            reject(error);
          }
        },
      };

      // Insert in priority order (stable for equal priority)
      const insertIndex = this.queue.findIndex(op => op.priority < queued.priority);
      if (insertIndex === -1) {
        this.queue.push(queued);
      } else {
        this.queue.splice(insertIndex, 0, queued);
      }

      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.active) return;

    const operation = this.queue.shift();
    if (!operation) return;

    this.active = operation;

    this.activeTimeout = setTimeout(() => {
      operation.fail(new GattTimeoutError(operation.id, operation.timeoutMs));
      this.finish(operation);
    }, operation.timeoutMs);

    operation
      .execute()
      .catch((error: unknown) => operation.fail(toError(error)))
      .finally(() => this.finish(operation));
  }

  private finish(operation: QueuedOperation): void {
    // A timed-out operation that settles later must not release its successor's slot
    if (this.active !== operation) return;

    if (this.activeTimeout) {
      clearTimeout(this.activeTimeout);
      this.activeTimeout = null;
    }
    this.active = null;
    this.processQueue();
  }

  /**
   * Reject every queued and active operation with the error from `reason`.
   */
  cancelAll(reason: (operationId: string) => Error): void {
    const pending = this.queue;
    this.queue = [];
    pending.forEach(op => op.fail(reason(op.id)));

    const active = this.active;
    if (active) {
      active.fail(reason(active.id));
      if (this.activeTimeout) {
        clearTimeout(this.activeTimeout);
        this.activeTimeout = null;
      }
      this.active = null;
    }
  }

  getStatus(): { queueSize: number; isActive: boolean; activeOperation: string | null } {
    return {
      queueSize: this.queue.length,
      isActive: this.active !== null,
      activeOperation: this.active?.id ?? null,
    };
  }
}
