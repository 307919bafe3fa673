/**
 * BLE Session Management - Type Definitions
 */

// ─────────────────────────────────────────────────────────────────────────────
// Enums
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Glove session connection state
 */
export enum SessionState {
  IDLE = 'idle',
  SCANNING = 'scanning',
  DISCOVERED = 'discovered',
  CONNECTING = 'connecting',
  SERVICE_DISCOVERY = 'service_discovery',
  READY = 'ready',
  DISCONNECTED = 'disconnected',
  RECONNECTING = 'reconnecting',
}

/**
 * Disconnect reason for reconnection handling
 */
export enum DisconnectReason {
  USER_REQUESTED = 'user_requested',
  CONNECTION_LOST = 'connection_lost',
  BLE_ERROR = 'ble_error',
  UNKNOWN = 'unknown',
}

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Transitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Valid state transitions
 * Key: current state, Value: array of valid next states
 */
export const TRANSITION_RULES: Record<SessionState, SessionState[]> = {
  [SessionState.IDLE]: [
    SessionState.SCANNING,
  ],
  [SessionState.SCANNING]: [
    SessionState.DISCOVERED,
    SessionState.IDLE,  // Nothing found, or cancelled
  ],
  [SessionState.DISCOVERED]: [
    SessionState.CONNECTING,
    SessionState.SCANNING,
    SessionState.IDLE,
  ],
  [SessionState.CONNECTING]: [
    SessionState.SERVICE_DISCOVERY,
    SessionState.DISCOVERED,    // Connect failed, handle still usable
    SessionState.RECONNECTING,  // Reconnect attempt failed
    SessionState.IDLE,
  ],
  [SessionState.SERVICE_DISCOVERY]: [
    SessionState.READY,
    SessionState.DISCOVERED,
    SessionState.RECONNECTING,
    SessionState.IDLE,
  ],
  [SessionState.READY]: [
    SessionState.DISCONNECTED,
    SessionState.IDLE,
  ],
  [SessionState.DISCONNECTED]: [
    SessionState.RECONNECTING,
    SessionState.SCANNING,  // Manual reconnect
    SessionState.IDLE,
  ],
  [SessionState.RECONNECTING]: [
    SessionState.CONNECTING,
    SessionState.SCANNING,  // Manual reconnect
    SessionState.IDLE,      // Retry budget exhausted, or user disconnect
  ],
};

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Constants
// ─────────────────────────────────────────────────────────────────────────────

export interface ReconnectSchedule {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  backoffMultiplier: number;
}

export const SESSION_CONFIG = {
  // Fixed 5 × 5s schedule; the device does not keep its config across a link reset
  reconnect: {
    baseDelayMs: 5000,
    maxDelayMs: 5000,
    maxAttempts: 5,
    backoffMultiplier: 1,
  },

  // disconnect() unblocks pending discover/connect within this window
  cancelGraceMs: 500,
} as const satisfies { reconnect: ReconnectSchedule; cancelGraceMs: number };

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionStateChange {
  previousState: SessionState;
  newState: SessionState;
  metadata?: Record<string, unknown>;
  timestamp: number;
}

export interface ReconnectState {
  attempts: number;
  nextAttemptAt: number | null;
  reason: DisconnectReason;
  isActive: boolean;
}

export type SessionStateChangeCallback = (change: SessionStateChange) => void;
