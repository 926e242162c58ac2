/**
 * Fetch State Machine
 *
 * Tracks the states a single fetch passes through and rejects transitions the
 * retrieval policy does not allow.
 */

import { FETCH_STATE_TRANSITIONS, type FetchState, type Logger } from '@waypost/core';

export type TerminalFetchState = Extract<FetchState, 'succeeded' | 'aborted' | 'exhausted'>;

export class InvalidFetchTransitionError extends Error {
  constructor(
    public currentState: FetchState,
    public targetState: FetchState
  ) {
    super(`Invalid fetch state transition: ${currentState} -> ${targetState}`);
    this.name = 'InvalidFetchTransitionError';
  }
}

export class FetchStateMachine {
  private current: FetchState = 'ranking';
  private visited: FetchState[] = ['ranking'];

  constructor(private logger?: Logger) {}

  get state(): FetchState {
    return this.current;
  }

  get history(): FetchState[] {
    return [...this.visited];
  }

  transition(target: FetchState): void {
    const validTransitions = FETCH_STATE_TRANSITIONS[this.current];

    if (!validTransitions.includes(target)) {
      throw new InvalidFetchTransitionError(this.current, target);
    }

    this.logger?.debug({ from: this.current, to: target }, 'Fetch state transitioned');
    this.current = target;
    this.visited.push(target);
  }

  /**
   * Move into a terminal state and return it
   */
  finish<T extends TerminalFetchState>(target: T): T {
    this.transition(target);
    return target;
  }
}
