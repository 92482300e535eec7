import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { pino } from "pino";
import { createInMemoryRemote } from "../../test-utils/remote.js";
import type { InMemoryRemote } from "../../test-utils/remote.js";
import { createCursorStore } from "../cursor.js";
import type { CycleStage } from "../types.js";
import type { CopyRule } from "./mirror.js";
import { createSyncPipeline } from "./pipeline.js";

const logger = pino({ level: "silent" });

interface Harness {
  dir: string;
  base: string;
  remote: InMemoryRemote;
  stages: CycleStage[];
}

async function withHarness(
  files: Record<string, string>,
  fn: (h: Harness) => Promise<void>,
): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "pipeline-test-"));
  try {
    await fn({
      dir,
      base: join(dir, "sync"),
      remote: createInMemoryRemote(files),
      stages: [],
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function makePipeline(
  h: Harness,
  options?: { command?: string; copyRules?: CopyRule[] },
) {
  return createSyncPipeline({
    remote: h.remote,
    cursorStore: createCursorStore(h.base),
    logger,
    basePath: h.base,
    remoteRoot: "/blog",
    build: { command: options?.command ?? "exit 0", workingDirectory: h.base },
    copyRules: options?.copyRules ?? [],
    onStage: (stage) => h.stages.push(stage),
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe("SyncPipeline", () => {
  it("runs a full cycle when no cursor is stored", async () => {
    await withHarness({ "/blog/content/post.md": "hello" }, async (h) => {
      const outcome = await makePipeline(h).run({ mode: "auto" });

      expect(outcome.status).toBe("success");
      expect(outcome.mode).toBe("full");
      expect(outcome.stage).toBe("committing-cursor");
      expect(outcome.skipped).toEqual([]);
      expect(outcome.cursorCommitted).toBe(true);
      expect(outcome.report?.fetched).toEqual([join(h.base, "content", "post.md")]);
      expect(h.stages).toEqual([
        "listing",
        "reconciling",
        "building",
        "mirroring",
        "committing-cursor",
      ]);
      expect(await createCursorStore(h.base).load()).toBe(h.remote.currentCursor);
    });
  });

  it("aborts on build failure without mirroring or committing", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const out = join(h.dir, "out");
      const outcome = await makePipeline(h, {
        command: "exit 3",
        copyRules: [
          { source: join(h.base, "*.md"), destination: out, recursive: false },
        ],
      }).run({ mode: "auto" });

      expect(outcome.status).toBe("aborted");
      expect(outcome.stage).toBe("building");
      expect(outcome.error).toBe("Build command failed with exit code 3");
      expect(outcome.cursorCommitted).toBe(false);
      expect(h.stages).toEqual(["listing", "reconciling", "building"]);
      expect(await exists(out)).toBe(false);
      expect(await createCursorStore(h.base).load()).toBeNull();
      // Reconciliation already happened and stays on disk
      expect(await readFile(join(h.base, "a.md"), "utf8")).toBe("a");
    });
  });

  it("short-circuits an incremental cycle with no changes", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const store = createCursorStore(h.base);
      await store.save(h.remote.currentCursor);

      const outcome = await makePipeline(h, {
        command: "echo built > marker.txt",
      }).run({ mode: "auto" });

      expect(outcome.status).toBe("success");
      expect(outcome.mode).toBe("incremental");
      expect(outcome.skipped).toEqual(["building", "mirroring"]);
      expect(outcome.cursorCommitted).toBe(true);
      expect(h.stages).toEqual(["listing", "reconciling", "committing-cursor"]);
      expect(await exists(join(h.base, "marker.txt"))).toBe(false);
      expect(await store.load()).toBe(h.remote.currentCursor);
    });
  });

  it("fetches changed files incrementally and commits the terminal cursor", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const store = createCursorStore(h.base);
      await store.save(h.remote.currentCursor);
      await writeFile(join(h.base, "local-only.md"), "keep me");
      h.remote.put("/blog/b.md", "b");
      h.remote.put("/blog/c.md", "c");
      h.remote.put("/blog/d.md", "d");

      const outcome = await makePipeline(h).run({ mode: "auto" });

      expect(outcome.mode).toBe("incremental");
      expect(outcome.status).toBe("success");
      expect(outcome.report?.fetched).toEqual([
        join(h.base, "b.md"),
        join(h.base, "c.md"),
        join(h.base, "d.md"),
      ]);
      expect(outcome.report?.deleted).toEqual([]);
      expect(await exists(join(h.base, "local-only.md"))).toBe(true);
      expect(await store.load()).toBe("cursor-4");
    });
  });

  it("starts from an explicit cursor", async () => {
    await withHarness({ "/blog/a.md": "a", "/blog/b.md": "b" }, async (h) => {
      const outcome = await makePipeline(h).run({
        mode: "incremental",
        cursor: "cursor-1",
      });

      expect(outcome.mode).toBe("incremental");
      expect(outcome.report?.fetched).toEqual([join(h.base, "b.md")]);
      expect(h.remote.downloads).toEqual(["/blog/b.md"]);
    });
  });

  it("aborts at listing and persists nothing when the remote fails", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      h.remote.failNextListing(new Error("connection reset"));

      const outcome = await makePipeline(h).run({ mode: "full" });

      expect(outcome.status).toBe("aborted");
      expect(outcome.stage).toBe("listing");
      expect(outcome.error).toBe("Remote listing failed: connection reset");
      expect(outcome.report).toBeNull();
      expect(h.stages).toEqual(["listing"]);
      expect(h.remote.downloads).toEqual([]);
      expect(await createCursorStore(h.base).load()).toBeNull();
    });
  });

  it("aborts when the stored cursor is rejected by the remote", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const outcome = await makePipeline(h).run({
        mode: "incremental",
        cursor: "cursor-99",
      });

      expect(outcome.status).toBe("aborted");
      expect(outcome.error).toBe(
        "Remote listing failed: Remote API error 409 on /2/files/list_folder/continue",
      );
    });
  });

  it("reports partial and keeps the cursor when a download fails", async () => {
    await withHarness({ "/blog/a.md": "a", "/blog/b.md": "b" }, async (h) => {
      h.remote.failDownload("/blog/a.md");

      const outcome = await makePipeline(h).run({ mode: "full" });

      expect(outcome.status).toBe("partial");
      expect(outcome.stage).toBe("committing-cursor");
      expect(outcome.cursorCommitted).toBe(false);
      expect(outcome.failures).toEqual([
        {
          path: "/blog/a.md",
          operation: "fetch",
          message: "Simulated download failure: /blog/a.md",
        },
      ]);
      expect(await createCursorStore(h.base).load()).toBeNull();
    });
  });

  it("retries an incrementally failed download on the next cycle", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const pipeline = makePipeline(h);
      const store = createCursorStore(h.base);
      await pipeline.run({ mode: "full" });
      expect(await store.load()).toBe("cursor-1");

      h.remote.put("/blog/b.md", "b");
      h.remote.failDownload("/blog/b.md");
      const failed = await pipeline.run({ mode: "auto" });

      expect(failed.mode).toBe("incremental");
      expect(failed.status).toBe("partial");
      expect(failed.cursorCommitted).toBe(false);
      expect(await store.load()).toBe("cursor-1");

      h.remote.restoreDownload("/blog/b.md");
      const retried = await pipeline.run({ mode: "auto" });

      expect(retried.mode).toBe("incremental");
      expect(retried.status).toBe("success");
      expect(retried.report?.fetched).toEqual([join(h.base, "b.md")]);
      expect(await readFile(join(h.base, "b.md"), "utf8")).toBe("b");
      expect(await store.load()).toBe("cursor-2");
    });
  });

  it("lists everything on a forced full sync despite a stored cursor", async () => {
    await withHarness({ "/blog/a.md": "a", "/blog/b.md": "b" }, async (h) => {
      const store = createCursorStore(h.base);
      await store.save("cursor-1");
      await writeFile(join(h.base, "stale.md"), "gone remotely");

      const outcome = await makePipeline(h).run({ mode: "full" });

      expect(outcome.mode).toBe("full");
      expect(outcome.status).toBe("success");
      expect(outcome.report?.fetched).toEqual([
        join(h.base, "a.md"),
        join(h.base, "b.md"),
      ]);
      expect(outcome.report?.deleted).toEqual([join(h.base, "stale.md")]);
      expect(await exists(join(h.base, ".sync_cursor"))).toBe(true);
      expect(await store.load()).toBe("cursor-2");
    });
  });

  it("commits the cursor even when a copy rule fails", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const blocked = join(h.dir, "blocked");
      await writeFile(blocked, "file in the way");

      const outcome = await makePipeline(h, {
        copyRules: [
          { source: join(h.base, "*.md"), destination: blocked, recursive: false },
        ],
      }).run({ mode: "full" });

      expect(outcome.status).toBe("partial");
      expect(outcome.cursorCommitted).toBe(true);
      expect(outcome.failures).toHaveLength(1);
      expect(outcome.failures[0].operation).toBe("copy");
    });
  });

  it("copies build output after a successful build", async () => {
    await withHarness({ "/blog/a.md": "a" }, async (h) => {
      const out = join(h.dir, "out");

      const outcome = await makePipeline(h, {
        command: "mkdir -p public && echo page > public/index.html",
        copyRules: [
          { source: join(h.base, "public", "*"), destination: out, recursive: true },
        ],
      }).run({ mode: "full" });

      expect(outcome.status).toBe("success");
      expect(await readFile(join(out, "index.html"), "utf8")).toBe("page\n");
    });
  });
});
