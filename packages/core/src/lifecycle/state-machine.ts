/**
 * Lifecycle of a storage node process.
 *
 * States:
 * - uninitialized: process started, nothing configured
 * - starting: config loaded, stores and bus connecting
 * - consuming: subscribed to the request queues
 * - shutting-down: unsubscribing and draining in-flight requests
 * - stopped: all resources released
 * - error: unrecoverable failure from any live state
 */

export type NodeState =
  | "uninitialized"
  | "starting"
  | "consuming"
  | "shutting-down"
  | "stopped"
  | "error";

const VALID_TRANSITIONS: Record<NodeState, ReadonlySet<NodeState>> = {
  uninitialized: new Set(["starting", "error"]),
  starting: new Set(["consuming", "shutting-down", "error"]),
  consuming: new Set(["shutting-down", "error"]),
  "shutting-down": new Set(["stopped", "error"]),
  stopped: new Set(),
  error: new Set(["starting", "stopped"]),
};

export interface StateTransitionEvent {
  from: NodeState;
  to: NodeState;
  timestamp: Date;
  reason?: string;
}

export type StateChangeListener = (event: StateTransitionEvent) => void;

export class NodeStateMachine {
  private state: NodeState = "uninitialized";
  private listeners: StateChangeListener[] = [];

  getState(): NodeState {
    return this.state;
  }

  canTransition(to: NodeState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /** @throws Error if the transition is not allowed from the current state */
  transition(to: NodeState, reason?: string): void {
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

  /** Returns an unsubscribe function. */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
