/**
 * Runtime state machine for the coordinator lifecycle.
 *
 * States:
 * - idle: Components built, no timers armed
 * - running: Scheduled tasks armed, requests served
 * - stopping: Timers cancelled, in-flight work settling
 * - stopped: All resources released
 */

export type RuntimeState = "idle" | "running" | "stopping" | "stopped";

/** Valid state transitions. Each key maps to the set of states it can transition to. */
const VALID_TRANSITIONS: Record<RuntimeState, ReadonlySet<RuntimeState>> = {
  idle: new Set(["running", "stopped"]),
  running: new Set(["stopping"]),
  stopping: new Set(["stopped"]),
  stopped: new Set(),
};

export interface StateTransitionEvent {
  from: RuntimeState;
  to: RuntimeState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class RuntimeStateMachine {
  private state: RuntimeState = "idle";
  private listeners: StateChangeListener[] = [];

  /** Get the current state. */
  getState(): RuntimeState {
    return this.state;
  }

  /** Check whether a transition to the target state is valid. */
  canTransition(to: RuntimeState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /**
   * Transition to a new state.
   * Throws if the transition is not valid.
   */
  transition(to: RuntimeState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${to}`);
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
