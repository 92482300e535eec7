import { describe, it, expect } from "vitest";
import { z } from "zod";
import { healthRoute } from "./health.js";

const HealthBody = z.object({
  status: z.string(),
  version: z.string(),
  uptime: z.number(),
});

describe("healthRoute", () => {
  it("GET /health returns status, version and uptime", async () => {
    const app = healthRoute({ version: "0.0.1", startedAt: new Date() });
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = HealthBody.parse(await res.json());
    expect(body.status).toBe("healthy");
    expect(body.version).toBe("0.0.1");
    expect(body.uptime).toBeGreaterThanOrEqual(0);
  });

  it("uptime increases over time", async () => {
    const past = new Date(Date.now() - 5000);
    const app = healthRoute({ version: "0.0.1", startedAt: past });
    const res = await app.request("/health");
    const body = HealthBody.parse(await res.json());

    expect(body.uptime).toBeGreaterThanOrEqual(5);
  });
});
