/**
 * In-process storage node for tests: memory blob store, memory key vault
 * and memory bus, with the backing maps exposed for inspection.
 */

import { vi } from "vitest";
import type { Logger } from "../logger/index.js";
import { createMemoryBus, type MemoryBus } from "../bus/memory.js";
import { DEFAULT_QUEUES } from "../bus/queues.js";
import { createMemoryBlobStore } from "../storage/adapters/memory.js";
import { createMemoryKeyVault } from "../keys/memory.js";
import { generateKey } from "../crypto/cipher.js";
import {
  createNodeKeyedLayer,
  createPerDocumentLayer,
  type EncryptionMode,
} from "../node/layer.js";
import type { NodeContext } from "../node/context.js";
import { decodeMessage, type Message } from "../protocol/messages.js";

export function makeMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

export interface TestNode extends NodeContext {
  bus: MemoryBus;
  blobs: Map<string, Uint8Array>;
  keys: Map<string, Uint8Array>;
  nodeKey: Uint8Array | null;
}

export function createTestNode(
  options: { mode?: EncryptionMode; nodeId?: string; bus?: MemoryBus } = {},
): TestNode {
  const mode = options.mode ?? "per-document";
  const blobs = new Map<string, Uint8Array>();
  const keys = new Map<string, Uint8Array>();
  const nodeKey = mode === "node-keyed" ? generateKey() : null;
  const layer = nodeKey
    ? createNodeKeyedLayer(nodeKey)
    : createPerDocumentLayer(createMemoryKeyVault(keys));

  return {
    nodeId: options.nodeId ?? "node-test",
    blobStore: createMemoryBlobStore(blobs),
    layer,
    bus: options.bus ?? createMemoryBus(),
    queues: { ...DEFAULT_QUEUES },
    logger: makeMockLogger(),
    blobs,
    keys,
    nodeKey,
  };
}

/**
 * Subscribe to a queue and collect every decoded message. Call
 * `bus.idle()` before reading the array.
 */
export function collectMessages(bus: MemoryBus, queue: string): Message[] {
  const messages: Message[] = [];
  bus.subscribe(queue, async (payload) => {
    const decoded = decodeMessage(payload);
    if (!decoded.ok) throw new Error(decoded.reason);
    messages.push(decoded.message);
  });
  return messages;
}
