import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { createCursorStore, DEFAULT_CURSOR_FILE } from "./cursor.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "sync-cursor-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("CursorStore", () => {
  it("lives in a dotfile inside the sync root", () => {
    const store = createCursorStore("/srv/blog");
    expect(store.path).toBe(join("/srv/blog", DEFAULT_CURSOR_FILE));
    expect(DEFAULT_CURSOR_FILE).toBe(".sync_cursor");
  });

  it("load returns null when the file is missing", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      expect(await store.load()).toBeNull();
    });
  });

  it("save then load returns the same token", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      await store.save("AAF-cursor-1");

      expect(await store.load()).toBe("AAF-cursor-1");
    });
  });

  it("save overwrites rather than appends", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      await store.save("first");
      await store.save("second");

      expect(await readFile(store.path, "utf-8")).toBe("second");
      // No temp files left behind
      expect(await readdir(dir)).toEqual([DEFAULT_CURSOR_FILE]);
    });
  });

  it("load treats an empty file as no cursor", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      await writeFile(store.path, "  \n");

      expect(await store.load()).toBeNull();
    });
  });

  it("load trims surrounding whitespace", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      await writeFile(store.path, "token-from-editor\n");

      expect(await store.load()).toBe("token-from-editor");
    });
  });

  it("load treats an unreadable path as no cursor", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir);
      // A directory where the file should be cannot be read as text
      await mkdir(store.path);

      expect(await store.load()).toBeNull();
    });
  });

  it("save creates the sync root if it doesn't exist", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(join(dir, "nonexistent"));
      await store.save("c1");

      expect(await store.load()).toBe("c1");
    });
  });

  it("clear removes the stored cursor and tolerates a missing file", async () => {
    await withTempDir(async (dir) => {
      const store = createCursorStore(dir, ".custom_cursor");
      await store.save("c1");
      await store.clear();
      await store.clear();

      expect(await store.load()).toBeNull();
    });
  });
});
