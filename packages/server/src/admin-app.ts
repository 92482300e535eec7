/**
 * Admin Hono app. Served on a separate port that is not meant to be
 * exposed publicly; routes carry no auth of their own.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { RemoteSource } from "@blogsync/core/remote";
import type { EventLoop } from "@blogsync/core/sync";
import { createErrorHandler, notFound } from "./error-handler.js";
import { syncRoutes, type ConfigSummary } from "./routes/sync.js";

export interface AdminAppDeps {
  logger: Logger;
  eventLoop: Pick<EventLoop, "enqueue" | "getStatus" | "resetCursor">;
  remote: Pick<RemoteSource, "getCurrentAccount" | "list">;
  summary: ConfigSummary;
}

export function createAdminApp(deps: AdminAppDeps): Hono {
  const app = new Hono();

  app.route(
    "/admin",
    syncRoutes({
      logger: deps.logger,
      eventLoop: deps.eventLoop,
      remote: deps.remote,
      summary: deps.summary,
    }),
  );

  app.get("/admin/health", (c) => {
    const { running, busy } = deps.eventLoop.getStatus();
    return c.json({ status: "healthy", running, busy });
  });

  app.onError(createErrorHandler(deps.logger));
  app.notFound(notFound);

  return app;
}
