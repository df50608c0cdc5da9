import { createMessageBus, type MessageBus } from "@coffer/core/bus";
import { createOwnerClient, type OwnerClient } from "@coffer/core/client";
import { loadConfig, resolveRootPath, rootLayout } from "@coffer/core/config";
import { createFilesystemKeyVault } from "@coffer/core/keys";
import { createLogger, type Logger } from "@coffer/core/logger";
import type { NodeConfig } from "@coffer/core/schemas";
import { createFilesystemBlobStore } from "@coffer/core/storage";

export interface OwnerDeps {
  /** Bus to use instead of the one config.json describes; not closed. */
  openBus?: (config: NodeConfig) => MessageBus;
  logger?: Logger;
}

export interface OwnerSession {
  client: OwnerClient;
  config: NodeConfig;
  close(): Promise<void>;
}

/**
 * Owner client over `<root>/owner/`, listening on the configured bus.
 * Callers must `close()` it so the process can exit.
 */
export async function openOwnerSession(
  rootPath: string | undefined,
  deps: OwnerDeps = {},
): Promise<OwnerSession> {
  const root = resolveRootPath(rootPath);
  const config = await loadConfig({ rootPath: root });
  const layout = rootLayout(root);
  const logger =
    deps.logger ??
    createLogger({ ...config.logging, level: "warn" }, { component: "cli" });

  const ownsBus = deps.openBus === undefined;
  const bus = deps.openBus
    ? deps.openBus(config)
    : createMessageBus(config.bus, {
        onError: (err, source) =>
          logger.error({ err, source }, "Response handling failed"),
      });

  const client = createOwnerClient({
    blobStore: createFilesystemBlobStore({ dir: layout.ownerBlobsDir }),
    keyVault: createFilesystemKeyVault({ dir: layout.ownerKeysDir }),
    bus,
    logger,
    queues: config.bus.queues,
    responseTimeoutMs: config.client.responseTimeoutMs,
  });
  client.start();

  return {
    client,
    config,
    async close() {
      await client.stop();
      if (ownsBus) await bus.close();
    },
  };
}

/** Run `fn` with an open session and always close it. */
export async function withOwnerSession<T>(
  rootPath: string | undefined,
  deps: OwnerDeps,
  fn: (session: OwnerSession) => Promise<T>,
): Promise<T> {
  const session = await openOwnerSession(rootPath, deps);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
