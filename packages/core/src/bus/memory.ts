import type {
  BusHandler,
  BusOptions,
  MessageBus,
  Subscription,
} from "./interface.js";
import { BusClosedError } from "./interface.js";

interface Consumer {
  readonly source: string;
  readonly handler: BusHandler;
  /** Own backlog for topic subscribers; queue consumers share the queue. */
  readonly inbox: Uint8Array[] | null;
  busy: boolean;
  active: boolean;
  current: Promise<void> | null;
}

export interface MemoryBus extends MessageBus {
  /** Number of payloads waiting on a queue with no free consumer. */
  queued(source: string): number;
  /**
   * Resolve once no delivery is in flight. Without an `onError` option,
   * handler failures collected since the last call are rethrown here as
   * an AggregateError.
   */
  idle(): Promise<void>;
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * In-process bus. Queue payloads published before anyone subscribes stay
 * queued and go to free consumers round-robin; topic payloads reach every
 * current subscriber. Each consumer handles one payload at a time.
 * Handlers run on a later event-loop turn than the publish call.
 */
export function createMemoryBus(options: BusOptions = {}): MemoryBus {
  const queues = new Map<string, Uint8Array[]>();
  const consumers = new Map<string, Consumer[]>();
  const listeners = new Map<string, Consumer[]>();
  const cursors = new Map<string, number>();
  const inFlight = new Set<Promise<void>>();
  const failures: unknown[] = [];
  let closed = false;

  function report(err: unknown, source: string): void {
    if (options.onError) {
      options.onError(err, source);
    } else {
      failures.push(err);
    }
  }

  function nextFreeConsumer(source: string): Consumer | undefined {
    const list = consumers.get(source) ?? [];
    const start = cursors.get(source) ?? 0;
    for (let i = 0; i < list.length; i++) {
      const index = (start + i) % list.length;
      const candidate = list[index];
      if (candidate && !candidate.busy) {
        cursors.set(source, index + 1);
        return candidate;
      }
    }
    return undefined;
  }

  function drain(source: string): void {
    const queue = queues.get(source);
    while (queue && queue.length > 0) {
      const consumer = nextFreeConsumer(source);
      if (!consumer) return;
      const payload = queue.shift();
      if (!payload) return;
      deliver(consumer, payload);
    }
  }

  function pump(listener: Consumer): void {
    if (listener.busy || !listener.active) return;
    const payload = listener.inbox?.shift();
    if (payload) deliver(listener, payload);
  }

  function deliver(consumer: Consumer, payload: Uint8Array): void {
    consumer.busy = true;
    const delivery = nextTurn()
      .then(() => consumer.handler(payload))
      .catch((err: unknown) => report(err, consumer.source))
      .finally(() => {
        consumer.busy = false;
        consumer.current = null;
        inFlight.delete(delivery);
        if (!consumer.active) return;
        if (consumer.inbox) pump(consumer);
        else drain(consumer.source);
      });
    consumer.current = delivery;
    inFlight.add(delivery);
  }

  function register(
    registry: Map<string, Consumer[]>,
    consumer: Consumer,
  ): Subscription {
    const { source } = consumer;
    registry.set(source, [...(registry.get(source) ?? []), consumer]);
    return {
      source,
      async unsubscribe() {
        consumer.active = false;
        consumer.inbox?.splice(0);
        registry.set(
          source,
          (registry.get(source) ?? []).filter((c) => c !== consumer),
        );
        if (consumer.current) await consumer.current;
      },
    };
  }

  return {
    async publish(destination, payload) {
      if (closed) throw new BusClosedError();
      const queue = queues.get(destination) ?? [];
      queue.push(new Uint8Array(payload));
      queues.set(destination, queue);
      drain(destination);
    },

    subscribe(source, handler): Subscription {
      if (closed) throw new BusClosedError();
      const subscription = register(consumers, {
        source,
        handler,
        inbox: null,
        busy: false,
        active: true,
        current: null,
      });
      drain(source);
      return subscription;
    },

    async broadcast(topic, payload) {
      if (closed) throw new BusClosedError();
      for (const listener of listeners.get(topic) ?? []) {
        listener.inbox?.push(new Uint8Array(payload));
        pump(listener);
      }
    },

    subscribeBroadcast(topic, handler): Subscription {
      if (closed) throw new BusClosedError();
      return register(listeners, {
        source: topic,
        handler,
        inbox: [],
        busy: false,
        active: true,
        current: null,
      });
    },

    queued(source) {
      return queues.get(source)?.length ?? 0;
    },

    async idle() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
      if (failures.length > 0) {
        const errors = failures.splice(0);
        throw new AggregateError(errors, "Message handlers failed");
      }
    },

    async close() {
      closed = true;
      for (const registry of [consumers, listeners]) {
        for (const list of registry.values()) {
          for (const consumer of list) {
            consumer.active = false;
            consumer.inbox?.splice(0);
          }
        }
        registry.clear();
      }
      await Promise.all([...inFlight]);
    },
  };
}
