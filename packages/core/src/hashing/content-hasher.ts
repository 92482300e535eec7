/**
 * Content hashing compatible with the remote store's `content_hash` field.
 *
 * The input is split into 4 MiB blocks. Each block is hashed with SHA-256,
 * and the concatenated block digests are hashed again with SHA-256. The
 * result is the hex encoding of that outer digest.
 */

import { createHash, type Hash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { HasherConsumedError } from "../errors/catalog.js";

export const BLOCK_SIZE = 4 * 1024 * 1024;

const ALGORITHM = "sha256";

export class ContentHasher {
  private readonly overall: Hash = createHash(ALGORITHM);
  private block: Hash = createHash(ALGORITHM);
  private blockPos = 0;
  private consumed = false;

  /** Feed bytes into the hasher. Callers may split input arbitrarily. */
  update(input: Uint8Array): this {
    this.assertLive();

    let offset = 0;
    while (offset < input.length) {
      // Finalize a full block only once more input arrives, so an input
      // ending exactly on a boundary never produces an empty trailing block.
      if (this.blockPos === BLOCK_SIZE) {
        this.overall.update(this.block.digest());
        this.block = createHash(ALGORITHM);
        this.blockPos = 0;
      }

      const take = Math.min(input.length - offset, BLOCK_SIZE - this.blockPos);
      this.block.update(input.subarray(offset, offset + take));
      this.blockPos += take;
      offset += take;
    }

    return this;
  }

  /** Returns the lowercase hex digest. The hasher cannot be used afterwards. */
  finalize(): string {
    this.assertLive();
    this.consumed = true;

    if (this.blockPos > 0) {
      this.overall.update(this.block.digest());
    }
    return this.overall.digest("hex");
  }

  private assertLive(): void {
    if (this.consumed) {
      throw new HasherConsumedError();
    }
  }
}

export function hashBytes(data: Uint8Array): string {
  return new ContentHasher().update(data).finalize();
}

export async function hashStream(stream: Readable): Promise<string> {
  const hasher = new ContentHasher();
  for await (const chunk of stream) {
    hasher.update(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return hasher.finalize();
}

/** Hash a file without buffering it. Rejects with the underlying I/O error. */
export async function hashFile(path: string): Promise<string> {
  return hashStream(createReadStream(path, { highWaterMark: 64 * 1024 }));
}

export async function filesMatch(
  path: string,
  remoteHash: string,
): Promise<boolean> {
  const localHash = await hashFile(path);
  return localHash === remoteHash.toLowerCase();
}
