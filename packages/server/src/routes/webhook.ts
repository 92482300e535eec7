/**
 * Change-notification webhook. The remote verifies the endpoint with a GET
 * challenge, then POSTs a notification whenever watched files change. The
 * notification carries no file details, so it only queues a sync.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import { InvalidRequestError } from "@blogsync/core/errors";
import type { EventLoop } from "@blogsync/core/sync";

export interface WebhookDeps {
  path: string;
  events: Pick<EventLoop, "enqueue">;
  logger: Logger;
}

const NotificationSchema = z.object({
  list_folder: z.object({ accounts: z.array(z.string()) }).optional(),
  delta: z.object({ users: z.array(z.number()) }).optional(),
});

export function webhookRoutes(deps: WebhookDeps): Hono {
  const app = new Hono();

  app.get(deps.path, (c) => {
    const challenge = c.req.query("challenge");
    if (!challenge) {
      throw new InvalidRequestError("Missing challenge parameter");
    }
    c.header("X-Content-Type-Options", "nosniff");
    return c.text(challenge);
  });

  app.post(deps.path, async (c) => {
    let body: unknown = null;
    try {
      body = await c.req.json();
    } catch (err) {
      // An unreadable body still counts as a change notification
      deps.logger.debug({ err }, "Notification body is not JSON");
    }

    const parsed = NotificationSchema.safeParse(body);
    if (parsed.success) {
      deps.logger.info(
        {
          accounts: parsed.data.list_folder?.accounts ?? [],
          users: parsed.data.delta?.users ?? [],
        },
        "Change notification received",
      );
    } else {
      deps.logger.info("Change notification received (unrecognized body)");
    }

    deps.events.enqueue({ type: "remote-changed" });
    return c.text("OK");
  });

  return app;
}
