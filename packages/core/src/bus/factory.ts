import { Redis } from "ioredis";
import type { BusConfig } from "../schemas/node-config.js";
import type { BusOptions, MessageBus } from "./interface.js";
import { createMemoryBus } from "./memory.js";
import { createRedisBus } from "./redis.js";

const MAX_RECONNECT_DELAY_MS = 5_000;

/** Open the bus a config section describes. */
export function createMessageBus(
  config: BusConfig,
  options: BusOptions = {},
): MessageBus {
  if (config.backend === "memory") {
    return createMemoryBus(options);
  }

  const redis = new Redis(config.url, {
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
  });
  redis.on("error", (err: Error) => options.onError?.(err, "redis"));

  return createRedisBus({
    redis,
    blockTimeoutSeconds: config.blockTimeoutSeconds,
    onError: options.onError,
  });
}
