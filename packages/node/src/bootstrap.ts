import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import { bytesToHex, randomBytes } from "@noble/hashes/utils.js";
import type { Hono } from "hono";
import type { NodeConfig } from "@coffer/core/schemas";
import {
  NODE_ID_ENV,
  resolveRootPath,
  rootLayout,
  saveConfig,
  type RootLayout,
} from "@coffer/core/config";
import { createLogger, type Logger } from "@coffer/core/logger";
import { NodeStateMachine } from "@coffer/core/lifecycle";
import {
  createMessageBus,
  type MessageBus,
  type Subscription,
} from "@coffer/core/bus";
import {
  createFilesystemKeyVault,
  createSqliteKeyVault,
  initializeKeyDatabase,
  loadOrCreateNodeKey,
  type KeyVault,
} from "@coffer/core/keys";
import { createFilesystemBlobStore } from "@coffer/core/storage";
import {
  attachRequestHandlers,
  createNodeKeyedLayer,
  createPerDocumentLayer,
  type NodeContext,
  type NodeLayer,
} from "@coffer/core/node";
import { createApp } from "./app.js";
import { ensureProfile } from "./profile.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface StorageNodeContext {
  app: Hono;
  logger: Logger;
  config: NodeConfig;
  nodeId: string;
  layout: RootLayout;
  startedAt: Date;
  state: NodeStateMachine;
  node: NodeContext;
  version: string;
  /** Subscribe the request handlers. */
  start: () => void;
  /** Unsubscribe, close the bus and release stores. Idempotent. */
  cleanup: () => Promise<void>;
}

export interface CreateStorageNodeOptions {
  rootPath?: string;
  /** Use this bus instead of the one config.bus describes. */
  bus?: MessageBus;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * Node id precedence: COFFER_NODE_ID, then config.json. A node with
 * neither gets a random id, which is written back to config.json so it
 * stays stable across restarts.
 */
export async function resolveNodeId(
  config: NodeConfig,
  rootPath: string,
  env: NodeJS.ProcessEnv,
): Promise<string> {
  const fromEnv = env[NODE_ID_ENV];
  if (fromEnv) return fromEnv;
  if (config.node.id) return config.node.id;

  const generated = `node-${bytesToHex(randomBytes(4))}`;
  await saveConfig(
    { ...config, node: { ...config.node, id: generated } },
    { rootPath },
  );
  return generated;
}

function openLayer(
  config: NodeConfig,
  layout: RootLayout,
): { layer: NodeLayer; close: () => void } {
  if (config.node.mode === "node-keyed") {
    const nodeKey = loadOrCreateNodeKey(layout.nodeKeyPath);
    return { layer: createNodeKeyedLayer(nodeKey), close: () => {} };
  }

  if (config.storage.keyVault === "sqlite") {
    const vault = createSqliteKeyVault(
      initializeKeyDatabase(layout.keyDatabasePath),
    );
    return { layer: createPerDocumentLayer(vault), close: () => vault.close() };
  }

  const vault: KeyVault = createFilesystemKeyVault({ dir: layout.keysDir });
  return { layer: createPerDocumentLayer(vault), close: () => {} };
}

export async function createStorageNode(
  config: NodeConfig,
  options: CreateStorageNodeOptions = {},
): Promise<StorageNodeContext> {
  const env = options.env ?? process.env;
  const startedAt = new Date();
  const layout = rootLayout(resolveRootPath(options.rootPath, env));
  await mkdir(layout.root, { recursive: true });

  const nodeId = await resolveNodeId(config, layout.root, env);
  const logger = options.logger ?? createLogger(config.logging, { nodeId });
  const state = new NodeStateMachine();
  state.onStateChange(({ from, to, reason }) =>
    logger.info({ from, to, reason }, "Node state changed"),
  );
  state.transition("starting");

  await ensureProfile(layout.profilePath, config.node.mode);
  const { layer, close: closeLayer } = openLayer(config, layout);

  const bus =
    options.bus ??
    createMessageBus(config.bus, {
      onError: (err, source) =>
        logger.error({ err, source }, "Request handling failed"),
    });

  const node: NodeContext = {
    nodeId,
    blobStore: createFilesystemBlobStore({ dir: layout.blobsDir }),
    layer,
    bus,
    queues: config.bus.queues,
    logger,
  };

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    nodeId,
    mode: config.node.mode,
    busBackend: options.bus ? "external" : config.bus.backend,
    port: config.health.enabled ? config.health.port : null,
    getState: () => state.getState(),
  });

  let subscriptions: Subscription[] = [];
  let cleanedUp = false;

  return {
    app,
    logger,
    config,
    nodeId,
    layout,
    startedAt,
    state,
    node,
    version: pkg.version,

    start() {
      subscriptions = attachRequestHandlers(node);
      state.transition("consuming");
      logger.info(
        { mode: config.node.mode, queues: subscriptions.map((s) => s.source) },
        "Consuming requests",
      );
    },

    async cleanup() {
      if (cleanedUp) return;
      cleanedUp = true;
      state.transition("shutting-down");
      await Promise.all(subscriptions.map((s) => s.unsubscribe()));
      subscriptions = [];
      await bus.close();
      closeLayer();
      state.transition("stopped");
    },
  };
}
