import type { SessionStatus } from './types.js';

/** Events that trigger state transitions. */
export type SessionEvent = 'start' | 'agreement' | 'round_limit' | 'failure';

/** Terminal states that do not accept any transitions. */
const TERMINAL_STATES: ReadonlySet<SessionStatus> = new Set(['AGREED', 'EXHAUSTED', 'FAILED']);

/**
 * Valid state transitions map.
 * Key: current status → Map of event → next status.
 */
const TRANSITIONS: Partial<Record<SessionStatus, Partial<Record<SessionEvent, SessionStatus>>>> = {
  NOT_STARTED: {
    start: 'IN_PROGRESS',
    failure: 'FAILED',
  },
  IN_PROGRESS: {
    agreement: 'AGREED',
    round_limit: 'EXHAUSTED',
    failure: 'FAILED',
  },
};

/**
 * Attempt a state transition. Returns the new status if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: SessionStatus, event: SessionEvent): SessionStatus | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  const allowed = TRANSITIONS[current];
  if (!allowed) {
    return null;
  }
  return allowed[event] ?? null;
}

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATES.has(status);
}
