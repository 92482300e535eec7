/**
 * Remote source backed by the Dropbox HTTP API (v2).
 *
 * RPC endpoints live on the API host and take JSON bodies; file downloads
 * live on the content host and take their argument in the Dropbox-API-Arg
 * header. Every call asks the token provider for a fresh bearer token.
 */

import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { z } from "zod";
import { RemoteApiError } from "../errors/catalog.js";
import type {
  AccountInfo,
  ChangeSet,
  ListPage,
  ListResult,
  RemoteEntry,
  RemoteSource,
  TokenProvider,
} from "./types.js";

export const DEFAULT_API_URL = "https://api.dropboxapi.com";
export const DEFAULT_CONTENT_URL = "https://content.dropboxapi.com";

const EntrySchema = z.object({
  ".tag": z.string(),
  name: z.string().optional(),
  path_display: z.string().optional(),
  path_lower: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  content_hash: z.string().optional(),
  server_modified: z.string().optional(),
});

const ListFolderResponseSchema = z.object({
  entries: z.array(EntrySchema),
  cursor: z.string(),
  has_more: z.boolean(),
});

const AccountSchema = z.object({
  account_id: z.string(),
  email: z.string(),
  name: z.object({ display_name: z.string() }),
});

export interface DropboxClientOptions {
  tokenProvider: TokenProvider;
  apiUrl?: string;
  contentUrl?: string;
}

function toRemoteEntry(entry: z.infer<typeof EntrySchema>): RemoteEntry {
  return {
    path: entry.path_display ?? entry.path_lower ?? "",
    size: entry.size ?? 0,
    contentHash: entry.content_hash,
    modified: entry.server_modified,
    isFile: entry[".tag"] === "file",
  };
}

/** JSON for an HTTP header: characters outside ASCII become \uXXXX escapes. */
export function httpHeaderSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (ch) => "\\u" + ch.charCodeAt(0).toString(16).padStart(4, "0"),
  );
}

export function createDropboxClient(
  options: DropboxClientOptions,
): RemoteSource {
  const apiBase = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
  const contentBase = (options.contentUrl ?? DEFAULT_CONTENT_URL).replace(
    /\/+$/,
    "",
  );
  const { tokenProvider } = options;

  async function rpc(endpoint: string, body: unknown): Promise<unknown> {
    const token = await tokenProvider.getAccessToken();
    const res = await fetch(`${apiBase}${endpoint}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      throw new RemoteApiError(res.status, endpoint, await res.text());
    }
    return res.json();
  }

  async function listContinue(cursor: string): Promise<ListPage> {
    const raw = await rpc("/2/files/list_folder/continue", { cursor });
    const page = ListFolderResponseSchema.parse(raw);
    return {
      entries: page.entries.map(toRemoteEntry),
      hasMore: page.has_more,
      cursor: page.cursor,
    };
  }

  return {
    async list(root: string, recursive: boolean): Promise<ListResult> {
      // The API addresses the root folder as the empty string
      const path = root === "/" ? "" : root;
      const raw = await rpc("/2/files/list_folder", {
        path,
        recursive,
        include_deleted: false,
        include_media_info: false,
      });
      const first = ListFolderResponseSchema.parse(raw);

      const entries = first.entries.map(toRemoteEntry);
      let cursor = first.cursor;
      let hasMore = first.has_more;
      while (hasMore) {
        const page = await listContinue(cursor);
        entries.push(...page.entries);
        cursor = page.cursor;
        hasMore = page.hasMore;
      }

      return { entries, cursor };
    },

    listContinue,

    async changesSince(cursor: string): Promise<ChangeSet> {
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

    async download(remotePath: string, localPath: string): Promise<void> {
      const endpoint = "/2/files/download";
      const token = await tokenProvider.getAccessToken();
      const res = await fetch(`${contentBase}${endpoint}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Dropbox-API-Arg": httpHeaderSafeJson({ path: remotePath }),
        },
      });
      if (!res.ok) {
        throw new RemoteApiError(res.status, endpoint, await res.text());
      }
      if (!res.body) {
        throw new RemoteApiError(res.status, endpoint, "No response body received");
      }

      // Atomic write: mkdir -p, stream to a temp file, rename
      await mkdir(dirname(localPath), { recursive: true });
      const tempPath = `${localPath}.tmp.${randomUUID()}`;
      try {
        await pipeline(
          Readable.fromWeb(res.body as Parameters<typeof Readable.fromWeb>[0]),
          createWriteStream(tempPath),
        );
        await rename(tempPath, localPath);
      } catch (err) {
        await rm(tempPath, { force: true });
        throw err;
      }
    },

    async getCurrentAccount(): Promise<AccountInfo> {
      const raw = await rpc("/2/users/get_current_account", null);
      const account = AccountSchema.parse(raw);
      return {
        accountId: account.account_id,
        email: account.email,
        displayName: account.name.display_name,
      };
    },
  };
}
