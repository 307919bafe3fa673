/**
 * BLE Session Management Module
 * Session state machine and reconnection policy
 */

// ─────────────────────────────────────────────────────────────────
// Core Types & Enums
// ─────────────────────────────────────────────────────────────────

export {
  SessionState,
  DisconnectReason,
  TRANSITION_RULES,
  SESSION_CONFIG,
} from './types';

export type {
  ReconnectSchedule,
  ReconnectState,
  SessionStateChange,
  SessionStateChangeCallback,
} from './types';

// ─────────────────────────────────────────────────────────────────
// Session Components
// ─────────────────────────────────────────────────────────────────

export { SessionStateMachine } from './SessionStateMachine';
export { ReconnectionManager } from './ReconnectionManager';
export type { ReconnectFunction, ReconnectionManagerOptions } from './ReconnectionManager';
