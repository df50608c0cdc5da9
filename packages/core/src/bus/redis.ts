import type { Redis } from "ioredis";
import type {
  BusHandler,
  BusOptions,
  MessageBus,
  Subscription,
} from "./interface.js";
import { BusClosedError } from "./interface.js";

export const DEFAULT_BLOCK_TIMEOUT_SECONDS = 5;
export const DEFAULT_RETRY_DELAY_MS = 500;
const MAX_RETRY_DELAY_MS = 30_000;

export interface RedisBusOptions extends BusOptions {
  /** Connection used for publishing; subscriptions duplicate it. */
  redis: Redis;
  /** BRPOP timeout; bounds how long unsubscribe waits for the loop. */
  blockTimeoutSeconds?: number;
  /** First pause after a failed BRPOP; doubles up to 30s. */
  retryDelayMs?: number;
}

/**
 * Work queues on Redis lists and topics on Redis pub/sub.
 *
 * `publish` is LPUSH; each queue subscription owns a duplicated connection
 * running a BRPOP loop, so consumers on the same list compete and every
 * payload is taken once. A payload popped by a consumer is gone from
 * Redis: a handler failure is reported and the loop moves on. A failed
 * BRPOP is reported and retried with backoff until unsubscribe.
 *
 * `broadcast` is PUBLISH; each topic subscription owns a duplicated
 * connection in subscriber mode, which ioredis resubscribes after a
 * reconnect. Payloads published while a subscriber is away are lost.
 */
export function createRedisBus(options: RedisBusOptions): MessageBus {
  const { redis, onError } = options;
  const blockTimeout =
    options.blockTimeoutSeconds ?? DEFAULT_BLOCK_TIMEOUT_SECONDS;
  const retryDelay = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const subscriptions = new Set<Subscription>();
  let closed = false;

  function report(err: unknown, source: string): void {
    onError?.(err, source);
  }

  function duplicate(source: string, isActive: () => boolean): Redis {
    const connection = redis.duplicate();
    connection.on("error", (err: Error) => {
      if (isActive()) report(err, source);
    });
    return connection;
  }

  function track(
    source: string,
    stop: () => Promise<void>,
  ): Subscription {
    let stopped = false;
    const subscription: Subscription = {
      source,
      async unsubscribe() {
        if (stopped) return;
        stopped = true;
        subscriptions.delete(subscription);
        await stop();
      },
    };
    subscriptions.add(subscription);
    return subscription;
  }

  return {
    async publish(destination, payload) {
      if (closed) throw new BusClosedError();
      await redis.lpush(destination, Buffer.from(payload));
    },

    subscribe(source: string, handler: BusHandler): Subscription {
      if (closed) throw new BusClosedError();
      let active = true;
      let cancelPause: (() => void) | undefined;
      const connection = duplicate(source, () => active);

      const pause = (ms: number) =>
        new Promise<void>((resolve) => {
          const timer = setTimeout(resolve, ms);
          cancelPause = () => {
            clearTimeout(timer);
            resolve();
          };
        });

      const loop = (async () => {
        let delay = retryDelay;
        while (active) {
          let popped: [Buffer, Buffer] | null;
          try {
            popped = await connection.brpopBuffer(source, blockTimeout);
          } catch (err) {
            if (!active) return;
            report(err, source);
            await pause(delay);
            delay = Math.min(delay * 2, MAX_RETRY_DELAY_MS);
            continue;
          }
          delay = retryDelay;
          if (!popped) continue;

          try {
            await handler(new Uint8Array(popped[1]));
          } catch (err) {
            report(err, source);
          }
        }
      })();

      return track(source, async () => {
        active = false;
        cancelPause?.();
        connection.disconnect();
        await loop;
      });
    },

    async broadcast(topic, payload) {
      if (closed) throw new BusClosedError();
      await redis.publish(topic, Buffer.from(payload));
    },

    subscribeBroadcast(topic: string, handler: BusHandler): Subscription {
      if (closed) throw new BusClosedError();
      let active = true;
      let chain = Promise.resolve();
      const connection = duplicate(topic, () => active);

      connection.on("messageBuffer", (channel: Buffer, message: Buffer) => {
        if (!active || channel.toString() !== topic) return;
        const payload = new Uint8Array(message);
        chain = chain
          .then(() => handler(payload))
          .catch((err: unknown) => report(err, topic));
      });
      const ready = connection.subscribe(topic).then(
        () => undefined,
        (err: unknown) => {
          if (active) report(err, topic);
        },
      );

      return track(topic, async () => {
        active = false;
        connection.disconnect();
        await ready;
        await chain;
      });
    },

    async close() {
      closed = true;
      await Promise.all([...subscriptions].map((s) => s.unsubscribe()));
      await redis.quit();
    },
  };
}
