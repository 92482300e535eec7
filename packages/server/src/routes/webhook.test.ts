import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { pino } from "pino";
import type { SyncEvent } from "@blogsync/core/sync";
import { createErrorHandler } from "../error-handler.js";
import { webhookRoutes } from "./webhook.js";

const logger = pino({ level: "silent" });

function setup() {
  const enqueue = vi.fn<(event: SyncEvent) => void>();
  const app = new Hono();
  app.route("/", webhookRoutes({ path: "/webhook", events: { enqueue }, logger }));
  app.onError(createErrorHandler(logger));
  return { app, enqueue };
}

describe("webhookRoutes", () => {
  it("echoes the verification challenge as plain text", async () => {
    const { app, enqueue } = setup();
    const res = await app.request("/webhook?challenge=abc123");

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("abc123");
    expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
    expect(enqueue).not.toHaveBeenCalled();
  });

  it("returns 400 when the challenge is missing", async () => {
    const { app } = setup();
    const res = await app.request("/webhook");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "INVALID_REQUEST",
        message: "Missing challenge parameter",
      },
    });
  });

  it("queues a change event for a notification", async () => {
    const { app, enqueue } = setup();
    const res = await app.request("/webhook", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        list_folder: { accounts: ["dbid:test-account"] },
        delta: { users: [12345] },
      }),
    });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("OK");
    expect(enqueue).toHaveBeenCalledWith({ type: "remote-changed" });
  });

  it("accepts a notification with an unreadable body", async () => {
    const { app, enqueue } = setup();
    const res = await app.request("/webhook", {
      method: "POST",
      body: "garbage",
    });

    expect(res.status).toBe(200);
    expect(enqueue).toHaveBeenCalledOnce();
  });
});
