/**
 * Lifecycle of one TaskScheduler run.
 *
 * States:
 * - planned: batches computed, no work started
 * - submitting: batches are being handed to the worker pool
 * - draining: no more batches will be submitted; waiting for in-flight ones
 * - done: terminal, the summary has been produced
 */

import { SchedulerStateError } from "../errors/catalog.js";

export type SchedulerState = "planned" | "submitting" | "draining" | "done";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<SchedulerState, ReadonlySet<SchedulerState>> = {
  planned: new Set(["submitting"]),
  submitting: new Set(["draining"]),
  draining: new Set(["done"]),
  done: new Set(),
};

export interface StateTransitionEvent {
  from: SchedulerState;
  to: SchedulerState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class SchedulerStateMachine {
  private state: SchedulerState = "planned";
  private listeners: StateChangeListener[] = [];

  /** Get the current state. */
  getState(): SchedulerState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: SchedulerState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws SchedulerStateError if the transition is not valid.
   */
  transition(to: SchedulerState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new SchedulerStateError(
        `Invalid state transition: ${this.state} -> ${to}`,
        { from: this.state, to },
      );
    }

    const event: StateTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
