import { Hono } from "hono";
import type { EventLoop } from "@blogsync/core/sync";
import type { Logger } from "pino";
import { createErrorHandler, notFound } from "./error-handler.js";
import { healthRoute } from "./routes/health.js";
import { webhookRoutes } from "./routes/webhook.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  webhookPath: string;
  events: Pick<EventLoop, "enqueue">;
}

/** Public app: health check and the change-notification webhook. */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.route(
    "/",
    healthRoute({ version: deps.version, startedAt: deps.startedAt }),
  );

  app.route(
    "/",
    webhookRoutes({
      path: deps.webhookPath,
      events: deps.events,
      logger: deps.logger,
    }),
  );

  app.onError(createErrorHandler(deps.logger));
  app.notFound(notFound);

  return app;
}
