import { describe, it, expect } from "vitest";
import {
  createEnvTokenProvider,
  createStaticTokenProvider,
  DEFAULT_TOKEN_ENV,
} from "./token.js";

describe("createStaticTokenProvider", () => {
  it("returns the configured token", async () => {
    const provider = createStaticTokenProvider("test-token");
    await expect(provider.getAccessToken()).resolves.toBe("test-token");
  });
});

describe("createEnvTokenProvider", () => {
  it("reads the default variable", async () => {
    const provider = createEnvTokenProvider(DEFAULT_TOKEN_ENV, {
      BLOGSYNC_ACCESS_TOKEN: "test-token",
    });
    await expect(provider.getAccessToken()).resolves.toBe("test-token");
  });

  it("reads the variable on every call", async () => {
    const env: NodeJS.ProcessEnv = { MY_TOKEN: "first" };
    const provider = createEnvTokenProvider("MY_TOKEN", env);

    await expect(provider.getAccessToken()).resolves.toBe("first");
    env.MY_TOKEN = "second";
    await expect(provider.getAccessToken()).resolves.toBe("second");
  });

  it("rejects when the variable is missing", async () => {
    const provider = createEnvTokenProvider("MY_TOKEN", {});
    await expect(provider.getAccessToken()).rejects.toThrow(
      "Access token not set: MY_TOKEN is empty",
    );
  });
});
