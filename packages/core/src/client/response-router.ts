import { ResponseTimeoutError } from "../errors/catalog.js";
import type { ResponseMessage } from "../protocol/messages.js";

export interface WaitOptions {
  /** Falls back to the router's default. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface PendingResponse<T> {
  readonly promise: Promise<T>;
  /** Reject with `reason` and drop the waiter; no-op once settled. */
  cancel(reason: unknown): void;
}

interface Waiter<T> {
  accept: (response: T) => boolean;
  resolve: (response: T) => void;
  reject: (reason: unknown) => void;
}

/**
 * One-shot waiters for responses correlated by blob id.
 *
 * Register with `wait()` before publishing the request; the first
 * delivered response the waiter accepts settles it. Several waiters on one
 * blob id are served in registration order, one response each.
 */
export class ResponseRouter<T extends ResponseMessage> {
  private readonly waiters = new Map<string, Waiter<T>[]>();

  constructor(
    private readonly kind: string,
    private readonly defaultTimeoutMs: number,
  ) {}

  get pending(): number {
    let count = 0;
    for (const list of this.waiters.values()) count += list.length;
    return count;
  }

  wait(
    blobId: string,
    options: WaitOptions & { accept?: (response: T) => boolean } = {},
  ): Promise<T> {
    return this.register(blobId, options).promise;
  }

  /** Like `wait`, with a handle to give up early, e.g. when publishing fails. */
  register(
    blobId: string,
    options: WaitOptions & { accept?: (response: T) => boolean } = {},
  ): PendingResponse<T> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    let cancel: (reason: unknown) => void = () => {};

    const promise = new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.remove(blobId, waiter);
      };
      const onAbort = () => {
        settle();
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        settle();
        reject(new ResponseTimeoutError(this.kind, blobId, timeoutMs));
      }, timeoutMs);
      const waiter: Waiter<T> = {
        accept: options.accept ?? (() => true),
        resolve: (response) => {
          settle();
          resolve(response);
        },
        reject: (reason) => {
          settle();
          reject(reason);
        },
      };

      cancel = waiter.reject;
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.set(blobId, [...(this.waiters.get(blobId) ?? []), waiter]);
    });
    return { promise, cancel: (reason) => cancel(reason) };
  }

  /** @returns true if a waiter took the response */
  deliver(response: T): boolean {
    const waiter = this.waiters
      .get(response.blobId)
      ?.find((candidate) => candidate.accept(response));
    if (!waiter) return false;
    waiter.resolve(response);
    return true;
  }

  /** Reject every outstanding waiter. */
  rejectAll(reason: unknown): void {
    const all = [...this.waiters.values()].flat();
    for (const waiter of all) waiter.reject(reason);
  }

  private remove(blobId: string, waiter: Waiter<T>): void {
    const remaining = (this.waiters.get(blobId) ?? []).filter(
      (w) => w !== waiter,
    );
    if (remaining.length > 0) this.waiters.set(blobId, remaining);
    else this.waiters.delete(blobId);
  }
}
