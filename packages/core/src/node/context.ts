import type { MessageBus } from "../bus/interface.js";
import type { QueueNames } from "../bus/queues.js";
import type { Logger } from "../logger/index.js";
import type { BlobStore } from "../storage/adapters/interface.js";
import type { NodeLayer } from "./layer.js";

/** Everything a request handler touches. */
export interface NodeContext {
  nodeId: string;
  blobStore: BlobStore;
  layer: NodeLayer;
  bus: MessageBus;
  queues: QueueNames;
  logger: Logger;
}
