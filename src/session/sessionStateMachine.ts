import { StreamingError } from '../errors.js';
import type { SessionEvent, SessionState, StateTransition } from '../types.js';

const TRANSITIONS: Record<SessionState, Partial<Record<SessionEvent, SessionState>>> = {
  idle: { connect: 'connecting' },
  connecting: { request_sent: 'awaiting_ack' },
  awaiting_ack: { accepted: 'streaming' },
  streaming: { audio_sent: 'streaming', end_of_input: 'finalizing' },
  finalizing: { final_ack: 'closed' },
  closed: {},
  errored: {},
};

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['closed', 'errored']);

export function isTerminalState(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Connection lifecycle of a single session. Every non-terminal state may `fail` into
 * `errored`; everything else follows the transition table, and anything the table
 * does not allow is an `invalid_state` error.
 */
export class SessionStateMachine {
  private current: SessionState = 'idle';
  private readonly listeners: ((transition: StateTransition) => void)[] = [];

  get state(): SessionState {
    return this.current;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  onTransition(cb: (transition: StateTransition) => void): void {
    this.listeners.push(cb);
  }

  can(event: SessionEvent): boolean {
    if (event === 'fail') return !this.isTerminal;
    return TRANSITIONS[this.current][event] !== undefined;
  }

  dispatch(event: Exclude<SessionEvent, 'fail'>): SessionState {
    const to = TRANSITIONS[this.current][event];
    if (!to) {
      throw new StreamingError('invalid_state', `event "${event}" is not allowed in state "${this.current}"`);
    }
    this.move(event, to);
    return to;
  }

  /** Move to `errored`. Returns false when the session had already ended. */
  fail(): boolean {
    if (this.isTerminal) return false;
    this.move('fail', 'errored');
    return true;
  }

  assertCanSendAudio(): void {
    if (this.current !== 'streaming') {
      throw new StreamingError('invalid_state', `cannot send audio in state "${this.current}"`);
    }
  }

  private move(event: SessionEvent, to: SessionState): void {
    const transition: StateTransition = { from: this.current, to, event };
    this.current = to;
    this.listeners.forEach((cb) => cb(transition));
  }
}
