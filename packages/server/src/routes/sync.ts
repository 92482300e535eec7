/**
 * Admin sync routes: queue cycles, reset the cursor, report status and
 * check remote connectivity. Mounted on the admin app only, which listens
 * on its own port.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import {
  InvalidRequestError,
  RemoteUnavailableError,
  errorMessage,
} from "@blogsync/core/errors";
import type { AccountInfo, RemoteSource } from "@blogsync/core/remote";
import type { EventLoop, SyncEvent } from "@blogsync/core/sync";

export interface ConfigSummary {
  remoteRoot: string;
  localBasePath: string;
  buildCommand: string | null;
  copyRules: number;
  coalesce: boolean;
  fullSyncIntervalMs: number | null;
}

export interface SyncRouteDeps {
  logger: Logger;
  eventLoop: Pick<EventLoop, "enqueue" | "getStatus" | "resetCursor">;
  remote: Pick<RemoteSource, "getCurrentAccount" | "list">;
  summary: ConfigSummary;
}

const SAMPLE_SIZE = 10;

const IncrementalBodySchema = z.object({
  cursor: z.string().min(1).optional(),
});

export function syncRoutes(deps: SyncRouteDeps): Hono {
  const app = new Hono();

  function queue(event: SyncEvent) {
    deps.eventLoop.enqueue(event);
    deps.logger.info({ event: event.type }, "Sync requested via admin API");
    return { status: "queued", event: event.type };
  }

  // POST /sync: full listing, reconcile, build
  app.post("/sync", (c) => {
    return c.json(queue({ type: "force-full-sync" }), 202);
  });

  // POST /sync/incremental: from the stored cursor, or one given in the body
  app.post("/sync/incremental", async (c) => {
    const raw = await c.req.text();

    let body: unknown = {};
    if (raw.trim() !== "") {
      try {
        body = JSON.parse(raw);
      } catch {
        throw new InvalidRequestError("Request body must be valid JSON");
      }
    }

    const parsed = IncrementalBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidRequestError("cursor must be a non-empty string", {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    const { cursor } = parsed.data;
    const event: SyncEvent = cursor
      ? { type: "remote-changed-with-cursor", cursor }
      : { type: "remote-changed" };
    return c.json(queue(event), 202);
  });

  // POST /cursor/reset: next cycle lists everything. Answers once the
  // worker has cleared it, after any cycle in flight.
  app.post("/cursor/reset", async (c) => {
    await deps.eventLoop.resetCursor();
    deps.logger.info("Sync cursor reset via admin API");
    return c.json({ status: "reset" });
  });

  app.get("/status", async (c) => {
    let account: AccountInfo | { error: string };
    try {
      account = await deps.remote.getCurrentAccount();
    } catch (err) {
      deps.logger.warn({ error: errorMessage(err) }, "Account lookup failed");
      account = { error: errorMessage(err) };
    }
    return c.json({
      ...deps.eventLoop.getStatus(),
      account,
      config: deps.summary,
    });
  });

  // GET /test: one-level listing of the remote root
  app.get("/test", async (c) => {
    const root = deps.summary.remoteRoot;
    let files: string[];
    try {
      const listing = await deps.remote.list(root, false);
      files = listing.entries.filter((e) => e.isFile).map((e) => e.path);
    } catch (err) {
      throw new RemoteUnavailableError(
        `Remote connectivity check failed: ${errorMessage(err)}`,
        { root },
      );
    }
    return c.json({
      status: "ok",
      root,
      fileCount: files.length,
      sample: files.slice(0, SAMPLE_SIZE),
    });
  });

  return app;
}
