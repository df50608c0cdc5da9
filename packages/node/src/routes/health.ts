import { Hono } from "hono";
import type { NodeState } from "@coffer/core/lifecycle";
import type { EncryptionMode } from "@coffer/core/node";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  nodeId: string;
  mode: EncryptionMode;
  busBackend: string;
  port: number | null;
  getState: () => NodeState;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  // 503 until the node consumes requests, so orchestrators can gate on it
  app.get("/health", (c) => {
    const state = deps.getState();
    const healthy = state === "consuming";
    return c.json(
      {
        status: healthy ? "healthy" : "unavailable",
        state,
        version: deps.version,
        uptime: Math.floor((Date.now() - deps.startedAt.getTime()) / 1000),
      },
      healthy ? 200 : 503,
    );
  });

  app.get("/status", (c) => {
    return c.json({
      state: deps.getState(),
      nodeId: deps.nodeId,
      mode: deps.mode,
      bus: deps.busBackend,
      port: deps.port,
      startedAt: deps.startedAt.toISOString(),
    });
  });

  return app;
}
