/**
 * In-process stand-in for a remote folder store.
 * Keeps files in memory, records a change log that cursors index into,
 * and writes downloads to the real local filesystem.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { RemoteApiError } from "../errors/catalog.js";
import { hashBytes } from "../hashing/content-hasher.js";
import type {
  AccountInfo,
  ChangeSet,
  ListPage,
  ListResult,
  RemoteEntry,
  RemoteSource,
} from "../remote/types.js";

export interface InMemoryRemoteOptions {
  /** Entries per continuation page (default: 2) */
  pageSize?: number;
  /** Attach content hashes to file entries (default: true) */
  withHashes?: boolean;
}

export interface InMemoryRemote extends RemoteSource {
  put(path: string, content: string | Uint8Array): void;
  remove(path: string): void;
  /** Remote paths downloaded so far, in order */
  readonly downloads: string[];
  /** Make every download of path reject */
  failDownload(path: string): void;
  /** Undo failDownload */
  restoreDownload(path: string): void;
  /** Make every account lookup reject */
  failAccount(error: Error): void;
  /** Make the next list/listContinue call reject */
  failNextListing(error: Error): void;
  readonly currentCursor: string;
}

interface StoredFile {
  path: string;
  data: Uint8Array;
  modified: string;
}

const CURSOR_PREFIX = "cursor-";

export function createInMemoryRemote(
  initial: Record<string, string> = {},
  options?: InMemoryRemoteOptions,
): InMemoryRemote {
  const pageSize = options?.pageSize ?? 2;
  const withHashes = options?.withHashes ?? true;

  const files = new Map<string, StoredFile>();
  const changes: RemoteEntry[] = [];
  const downloads: string[] = [];
  const failingDownloads = new Set<string>();
  let pendingListingError: Error | null = null;
  let accountError: Error | null = null;

  function toEntry(file: StoredFile): RemoteEntry {
    return {
      path: file.path,
      size: file.data.length,
      contentHash: withHashes ? hashBytes(file.data) : undefined,
      modified: file.modified,
      isFile: true,
    };
  }

  function cursorAt(position: number): string {
    return `${CURSOR_PREFIX}${position}`;
  }

  function takeListingError(): void {
    if (pendingListingError) {
      const err = pendingListingError;
      pendingListingError = null;
      throw err;
    }
  }

  function isUnder(path: string, root: string, recursive: boolean): boolean {
    const base = root === "/" ? "" : root.replace(/\/+$/, "").toLowerCase();
    const lower = path.toLowerCase();
    if (!lower.startsWith(base + "/")) return false;
    return recursive || !lower.slice(base.length + 1).includes("/");
  }

  function put(path: string, content: string | Uint8Array): void {
    const data =
      typeof content === "string" ? new TextEncoder().encode(content) : content;
    const file: StoredFile = {
      path,
      data,
      modified: new Date().toISOString(),
    };
    files.set(path.toLowerCase(), file);
    changes.push(toEntry(file));
  }

  for (const [path, content] of Object.entries(initial)) {
    put(path, content);
  }

  async function listContinue(cursor: string): Promise<ListPage> {
    takeListingError();
    const position = Number(cursor.slice(CURSOR_PREFIX.length));
    if (
      !cursor.startsWith(CURSOR_PREFIX) ||
      !Number.isInteger(position) ||
      position > changes.length
    ) {
      throw new RemoteApiError(409, "/2/files/list_folder/continue", "reset");
    }
    const entries = changes.slice(position, position + pageSize);
    const next = position + entries.length;
    return {
      entries,
      hasMore: next < changes.length,
      cursor: cursorAt(next),
    };
  }

  return {
    downloads,

    get currentCursor() {
      return cursorAt(changes.length);
    },

    put,

    remove(path) {
      const key = path.toLowerCase();
      const existing = files.get(key);
      if (!existing) return;
      files.delete(key);
      changes.push({ path: existing.path, size: 0, isFile: false });
    },

    failDownload(path) {
      failingDownloads.add(path.toLowerCase());
    },

    restoreDownload(path) {
      failingDownloads.delete(path.toLowerCase());
    },

    failAccount(error) {
      accountError = error;
    },

    failNextListing(error) {
      pendingListingError = error;
    },

    async list(root, recursive): Promise<ListResult> {
      takeListingError();
      const entries: RemoteEntry[] = [];
      const folders = new Set<string>();
      for (const file of files.values()) {
        if (!isUnder(file.path, root, recursive)) continue;
        const parent = file.path.slice(0, file.path.lastIndexOf("/"));
        if (parent && isUnder(parent, root, recursive) && !folders.has(parent)) {
          folders.add(parent);
          entries.push({ path: parent, size: 0, isFile: false });
        }
        entries.push(toEntry(file));
      }
      return { entries, cursor: cursorAt(changes.length) };
    },

    listContinue,

    async changesSince(cursor): Promise<ChangeSet> {
      const entries: RemoteEntry[] = [];
      let current = cursor;
      let hasMore = true;
      while (hasMore) {
        const page = await listContinue(current);
        entries.push(...page.entries);
        current = page.cursor;
        hasMore = page.hasMore;
      }
      return { entries, cursor: current };
    },

    async download(remotePath, localPath) {
      const key = remotePath.toLowerCase();
      if (failingDownloads.has(key)) {
        throw new Error(`Simulated download failure: ${remotePath}`);
      }
      const file = files.get(key);
      if (!file) {
        throw new RemoteApiError(409, "/2/files/download", "path/not_found/");
      }
      downloads.push(remotePath);
      await mkdir(dirname(localPath), { recursive: true });
      await writeFile(localPath, file.data);
    },

    async getCurrentAccount(): Promise<AccountInfo> {
      if (accountError) throw accountError;
      return {
        accountId: "dbid:test-account",
        email: "owner@example.com",
        displayName: "Test Owner",
      };
    },
  };
}
