/**
 * Transport capability the node and the owner client talk through.
 *
 * Two delivery shapes:
 * - work queues (`publish` / `subscribe`): each payload goes to exactly
 *   one subscriber, so several nodes on one request queue compete for
 *   work. Payloads wait for a subscriber.
 * - topics (`broadcast` / `subscribeBroadcast`): each payload goes to
 *   every current subscriber. Nothing is kept for later subscribers.
 */

export type BusHandler = (payload: Uint8Array) => Promise<void>;

/** Receives handler and transport failures instead of the caller. */
export type BusErrorHandler = (err: unknown, source: string) => void;

export interface BusOptions {
  onError?: BusErrorHandler;
}

export interface Subscription {
  readonly source: string;
  /** Stop consuming. Resolves once the in-flight delivery has settled. */
  unsubscribe(): Promise<void>;
}

export interface MessageBus {
  publish(destination: string, payload: Uint8Array): Promise<void>;
  subscribe(source: string, handler: BusHandler): Subscription;
  broadcast(topic: string, payload: Uint8Array): Promise<void>;
  /** Handles one payload at a time, in arrival order. */
  subscribeBroadcast(topic: string, handler: BusHandler): Subscription;
  /** Unsubscribe everything and release connections. */
  close(): Promise<void>;
}

export class BusClosedError extends Error {
  constructor() {
    super("Message bus is closed");
    this.name = "BusClosedError";
  }
}
