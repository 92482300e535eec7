import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { randomUUID } from "node:crypto";

export const DEFAULT_CURSOR_FILE = ".sync_cursor";

export interface CursorStore {
  /** Absolute path of the cursor file */
  readonly path: string;

  /** Read the stored cursor. Missing, unreadable or empty files yield null. */
  load(): Promise<string | null>;

  /** Overwrite the stored cursor. */
  save(cursor: string): Promise<void>;

  /** Forget the stored cursor so the next cycle lists everything. */
  clear(): Promise<void>;
}

/**
 * Creates a cursor store that keeps the token in a dotfile inside the local
 * sync root. Single process, single writer: nothing here locks.
 */
export function createCursorStore(
  basePath: string,
  fileName: string = DEFAULT_CURSOR_FILE,
): CursorStore {
  const path = join(basePath, fileName);

  return {
    path,

    async load() {
      let raw: string;
      try {
        raw = await readFile(path, "utf-8");
      } catch {
        return null;
      }
      const cursor = raw.trim();
      return cursor.length > 0 ? cursor : null;
    },

    async save(cursor) {
      await mkdir(dirname(path), { recursive: true });
      const tempPath = `${path}.tmp.${randomUUID()}`;
      await writeFile(tempPath, cursor, "utf-8");
      await rename(tempPath, path);
    },

    async clear() {
      await rm(path, { force: true });
    },
  };
}
