import { stat } from "node:fs/promises";
import { errorMessage } from "../errors/catalog.js";
import { hashFile } from "../hashing/content-hasher.js";
import type { RemoteEntry } from "../remote/types.js";

/**
 * How a local file was compared against its remote entry. The remote hash
 * is authoritative; size is the fallback when no hash is available or the
 * local file cannot be hashed.
 */
export type LocalComparison =
  | { kind: "missing" }
  | { kind: "hash"; localHash: string; remoteHash: string }
  | {
      kind: "size";
      localSize: number;
      remoteSize: number;
      reason: "no-remote-hash" | "hash-failed";
      error?: string;
    };

export async function compareLocal(
  entry: RemoteEntry,
  localPath: string,
): Promise<LocalComparison> {
  let localSize: number;
  try {
    const stats = await stat(localPath);
    if (!stats.isFile()) {
      return { kind: "missing" };
    }
    localSize = stats.size;
  } catch {
    return { kind: "missing" };
  }

  if (!entry.contentHash) {
    return {
      kind: "size",
      localSize,
      remoteSize: entry.size,
      reason: "no-remote-hash",
    };
  }

  try {
    const localHash = await hashFile(localPath);
    return {
      kind: "hash",
      localHash,
      remoteHash: entry.contentHash.toLowerCase(),
    };
  } catch (err) {
    return {
      kind: "size",
      localSize,
      remoteSize: entry.size,
      reason: "hash-failed",
      error: errorMessage(err),
    };
  }
}

export function needsFetch(comparison: LocalComparison): boolean {
  switch (comparison.kind) {
    case "missing":
      return true;
    case "hash":
      return comparison.localHash !== comparison.remoteHash;
    case "size":
      return comparison.localSize !== comparison.remoteSize;
  }
}
