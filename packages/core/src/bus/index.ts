export {
  BusClosedError,
  type BusHandler,
  type BusErrorHandler,
  type BusOptions,
  type MessageBus,
  type Subscription,
} from "./interface.js";
export { createMemoryBus, type MemoryBus } from "./memory.js";
export {
  createRedisBus,
  DEFAULT_BLOCK_TIMEOUT_SECONDS,
  DEFAULT_RETRY_DELAY_MS,
  type RedisBusOptions,
} from "./redis.js";
export { DEFAULT_QUEUES, type QueueNames } from "./queues.js";
export { createMessageBus } from "./factory.js";
