/**
 * Reconnection Manager
 * Retries a lost glove link on a bounded schedule (5 attempts, 5s apart by default)
 */

import { createLogger } from '../shared/Logger';
import { describeError } from '../shared/errors';
import { DisconnectReason, SESSION_CONFIG, type ReconnectSchedule, type ReconnectState } from './types';

const log = createLogger('ReconnectManager');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** One reconnect attempt; resolves true once the session is READY again */
export type ReconnectFunction = (attempt: number) => Promise<boolean>;

export interface ReconnectionManagerOptions {
  deviceName: string;
  connect: ReconnectFunction;
  onScheduled?: (attempt: number, nextAttemptAt: number) => void;
  onReconnected?: (attempts: number) => void;
  onExhausted: (attempts: number) => void;
  schedule?: ReconnectSchedule;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reconnection Manager Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class ReconnectionManager {
  private timer: NodeJS.Timeout | null = null;
  private attempts = 0;
  private reason: DisconnectReason | null = null;
  private nextAttemptAt: number | null = null;
  private attemptInFlight = false;
  private readonly schedule: ReconnectSchedule;

  constructor(private readonly options: ReconnectionManagerOptions) {
    this.schedule = options.schedule ?? SESSION_CONFIG.reconnect;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reconnection Logic
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Schedule the next reconnection attempt
   */
  scheduleReconnect(reason: DisconnectReason): void {
    const { deviceName } = this.options;

    if (reason === DisconnectReason.USER_REQUESTED) {
      log.info(`🛑 [${deviceName}] User disconnect - not reconnecting`);
      return;
    }

    this.cancelTimer();

    const { maxAttempts } = this.schedule;
    if (this.attempts >= maxAttempts) {
      log.warn(`❌ [${deviceName}] Max reconnect attempts (${maxAttempts}) reached`);
      const attempts = this.attempts;
      this.cleanup();
      this.options.onExhausted(attempts);
      return;
    }

    const delay = this.calculateDelay(this.attempts);
    this.attempts++;
    this.reason = reason;
    this.nextAttemptAt = Date.now() + delay;

    log.info(`🔄 [${deviceName}] Scheduling reconnect attempt ${this.attempts}/${maxAttempts} in ${delay}ms`);
    this.options.onScheduled?.(this.attempts, this.nextAttemptAt);

    this.timer = setTimeout(() => {
      this.timer = null;
      this.attemptReconnect().catch((error: unknown) => {
        log.error(`[${deviceName}] Reconnect loop failed: ${describeError(error)}`);
      });
    }, delay);
  }

  /**
   * Delay before the given (0-based) attempt
   */
  private calculateDelay(attempts: number): number {
    const { baseDelayMs, maxDelayMs, backoffMultiplier } = this.schedule;
    const delay = baseDelayMs * Math.pow(backoffMultiplier, attempts);
    return Math.min(delay, maxDelayMs);
  }

  private async attemptReconnect(): Promise<void> {
    const { deviceName, connect } = this.options;
    const attempt = this.attempts;
    const reason = this.reason ?? DisconnectReason.CONNECTION_LOST;

    log.info(`🔌 [${deviceName}] Reconnect attempt ${attempt}/${this.schedule.maxAttempts}...`);
    this.nextAttemptAt = null;
    this.attemptInFlight = true;

    let success = false;
    try {
      success = await connect(attempt);
    } catch (error) {
      log.warn(`❌ [${deviceName}] Reconnect attempt ${attempt} error: ${describeError(error)}`);
    } finally {
      this.attemptInFlight = false;
    }

    // Cancelled while the attempt was running
    if (this.reason === null) return;

    if (success) {
      log.info(`✅ [${deviceName}] Reconnected after ${attempt} attempt(s)`);
      this.cleanup();
      this.options.onReconnected?.(attempt);
      return;
    }

    this.scheduleReconnect(reason);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Control
  // ───────────────────────────────────────────────────────────────────────────

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Stop retrying and forget attempt counts
   */
  cleanup(): void {
    this.cancelTimer();
    this.attempts = 0;
    this.reason = null;
    this.nextAttemptAt = null;
  }

  getState(): ReconnectState | null {
    if (this.reason === null) return null;

    return {
      attempts: this.attempts,
      nextAttemptAt: this.nextAttemptAt,
      reason: this.reason,
      isActive: this.timer !== null || this.attemptInFlight,
    };
  }

  isReconnecting(): boolean {
    return this.reason !== null;
  }
}
