/**
 * State Machine
 *
 * Enforces valid state transitions for a flow run.
 *
 * This is about RULES, not execution. It answers:
 * - Can this state transition happen?
 * - What are the valid next states?
 * - Is this state terminal?
 *
 * Run lifecycle:
 * PENDING → RUNNING → COMPLETED (every task succeeded)
 * PENDING → RUNNING → FAILED (first failure)
 *
 * @module state
 */

import { RunState } from '../types/core-types.js';
import { InvalidStateTransitionError } from '../errors/index.js';

/**
 * State transition record for audit trail
 */
export interface StateTransition<T> {
  readonly from: T;
  readonly to: T;
  /** ms since epoch */
  readonly timestamp: number;
  readonly reason?: string;
}

export interface StateMachineConfig<T> {
  readonly initialState: T;
  /** from → allowed to-states */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  readonly terminalStates: ReadonlySet<T>;
}

export type TransitionListener<T> = (transition: StateTransition<T>) => void;

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T> {
  private currentState: T;
  private readonly config: StateMachineConfig<T>;
  private readonly history: StateTransition<T>[] = [];
  private readonly listeners: TransitionListener<T>[] = [];

  constructor(config: StateMachineConfig<T>) {
    this.config = config;
    this.currentState = config.initialState;
  }

  getState(): T {
    return this.currentState;
  }

  canTransition(to: T): boolean {
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }
    const allowed = this.config.transitions.get(this.currentState);
    return allowed !== undefined && allowed.includes(to);
  }

  /**
   * @throws {InvalidStateTransitionError} If the transition is not allowed
   */
  transition(to: T, reason?: string): StateTransition<T> {
    if (!this.canTransition(to)) {
      throw new InvalidStateTransitionError(String(this.currentState), String(to));
    }

    const record: StateTransition<T> = { from: this.currentState, to, timestamp: Date.now(), reason };
    this.currentState = to;
    this.history.push(record);

    for (const listener of this.listeners) {
      listener(record);
    }
    return record;
  }

  onTransition(listener: TransitionListener<T>): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  getAllowedTransitions(): readonly T[] {
    return this.isTerminal() ? [] : this.config.transitions.get(this.currentState) ?? [];
  }

  getHistory(): readonly StateTransition<T>[] {
    return [...this.history];
  }
}

const RUN_TRANSITIONS = new Map<RunState, readonly RunState[]>([
  [RunState.PENDING, [RunState.RUNNING]],
  [RunState.RUNNING, [RunState.COMPLETED, RunState.FAILED]],
  [RunState.COMPLETED, []], // Terminal
  [RunState.FAILED, []], // Terminal
]);

const RUN_TERMINAL_STATES = new Set<RunState>([RunState.COMPLETED, RunState.FAILED]);

export function createRunStateMachine(): StateMachine<RunState> {
  return new StateMachine<RunState>({
    initialState: RunState.PENDING,
    transitions: RUN_TRANSITIONS,
    terminalStates: RUN_TERMINAL_STATES,
  });
}

export function isRunTerminal(state: RunState): boolean {
  return RUN_TERMINAL_STATES.has(state);
}
