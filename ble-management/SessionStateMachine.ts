/**
 * Session State Machine
 * Validated transitions for one glove session; every change is a 'stateChanged' event.
 */

import { EventEmitter } from 'events';
import { InvalidTransitionError } from '../shared/errors';
import { SessionState, TRANSITION_RULES, type SessionStateChange } from './types';

export class SessionStateMachine extends EventEmitter {
  private state: SessionState = SessionState.IDLE;
  private previousState: SessionState | null = null;
  private stateChangedAt: number = Date.now();

  getState(): SessionState {
    return this.state;
  }

  getPreviousState(): SessionState | null {
    return this.previousState;
  }

  getStateChangedAt(): number {
    return this.stateChangedAt;
  }

  /**
   * Check if a state transition is valid
   */
  validateTransition(from: SessionState, to: SessionState): boolean {
    return TRANSITION_RULES[from].includes(to);
  }

  getValidTransitions(state: SessionState = this.state): SessionState[] {
    return [...TRANSITION_RULES[state]];
  }

  canTransition(targetState: SessionState): boolean {
    return this.validateTransition(this.state, targetState);
  }

  is(...states: SessionState[]): boolean {
    return states.includes(this.state);
  }

  /**
   * Transition to a new state (with validation)
   * @throws InvalidTransitionError if transition is not valid
   */
  transition(newState: SessionState, metadata?: Record<string, unknown>): void {
    const previousState = this.state;

    if (!this.validateTransition(previousState, newState)) {
      throw new InvalidTransitionError(previousState, newState);
    }

    const now = Date.now();
    this.previousState = previousState;
    this.state = newState;
    this.stateChangedAt = now;

    const change: SessionStateChange = {
      previousState,
      newState,
      metadata,
      timestamp: now,
    };
    this.emit('stateChanged', change);
  }

  /**
   * Return to IDLE from any state (teardown path)
   */
  reset(metadata?: Record<string, unknown>): void {
    if (this.state === SessionState.IDLE) return;
    this.transition(SessionState.IDLE, metadata);
  }
}
