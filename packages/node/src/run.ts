import { serve, type ServerType } from "@hono/node-server";
import { loadConfig } from "@coffer/core/config";
import { writePidFile, removePidFile } from "@coffer/runtime";
import { createStorageNode } from "./bootstrap.js";

const DRAIN_TIMEOUT_MS = 5_000;

export interface RunOptions {
  rootPath?: string;
}

/**
 * Run a storage node until SIGINT or SIGTERM: health endpoint, request
 * consumers and the metadata file.
 */
export async function runStorageNode(options: RunOptions = {}): Promise<void> {
  const { rootPath } = options;
  const config = await loadConfig({ rootPath });
  const context = await createStorageNode(config, { rootPath });
  const { app, logger, layout, nodeId, version } = context;

  let server: ServerType | undefined;
  if (config.health.enabled) {
    server = serve({ fetch: app.fetch, port: config.health.port }, (info) => {
      logger.info({ port: info.port, version }, "Health endpoint listening");
    });
  }

  context.start();

  await writePidFile(layout.root, {
    pid: process.pid,
    nodeId,
    mode: config.node.mode,
    healthPort: config.health.enabled ? config.health.port : null,
    version,
    startedAt: context.startedAt.toISOString(),
  });

  let shuttingDown = false;
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received, draining requests");

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    await removePidFile(layout.root);
    await context.cleanup();

    if (!server) {
      logger.info("Node stopped");
      process.exit(0);
    }
    server.close(() => {
      logger.info("Node stopped");
      process.exit(0);
    });
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}
