import { Hono } from "hono";
import type { Logger } from "@coffer/core/logger";
import { healthRoute, type HealthDeps } from "./routes/health.js";

export interface AppDeps extends HealthDeps {
  logger: Logger;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.route("/", healthRoute(deps));

  app.notFound((c) =>
    c.json(
      { error: { errorCode: "NOT_FOUND", message: "Not found" } },
      404,
    ),
  );

  app.onError((err, c) => {
    deps.logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.json(
      {
        error: { errorCode: "INTERNAL_ERROR", message: "Internal server error" },
      },
      500,
    );
  });

  return app;
}
