/**
 * Tree reconciliation: decide which remote files to fetch, fetch them one at
 * a time, and (after a full listing) prune local files and directories the
 * remote no longer has.
 *
 * Fetches are strictly sequential. The deletion pass needs the complete set
 * of expected paths, and nothing is deleted after an incremental listing
 * because a change feed does not enumerate the full remote state.
 */

import { mkdir, readdir, rmdir, unlink } from "node:fs/promises";
import { relative, resolve, sep } from "node:path";
import * as fsWalk from "@nodelib/fs.walk";
import type { Logger } from "pino";
import { errorMessage } from "../errors/catalog.js";
import type { RemoteEntry, RemoteSource } from "../remote/types.js";
import { compareLocal, needsFetch } from "./compare.js";
import { localPathFor } from "./paths.js";
import type {
  EntityFailure,
  ReconciliationPlan,
  ReconcileReport,
  SyncMode,
} from "./types.js";

export interface PlanOptions {
  basePath: string;
  remoteRoot: string;
}

export interface ReconcilerDeps extends PlanOptions {
  remote: Pick<RemoteSource, "download">;
  logger: Logger;
  /** Files under basePath the pruning pass must keep, e.g. the cursor file */
  protectedPaths?: readonly string[];
}

export interface BuiltPlan extends ReconciliationPlan {
  /** File entries whose paths could not be mapped under the base */
  rejected: EntityFailure[];
}

/** Project the file entries of a listing onto the local tree, in listing order. */
export function buildPlan(
  entries: readonly RemoteEntry[],
  options: PlanOptions,
): BuiltPlan {
  const plan: BuiltPlan = {
    toFetch: [],
    expectedPaths: new Set(),
    rejected: [],
  };

  for (const entry of entries) {
    if (!entry.isFile) continue;

    let localPath: string;
    try {
      localPath = localPathFor(entry.path, options.remoteRoot, options.basePath);
    } catch (err) {
      plan.rejected.push({
        path: entry.path,
        operation: "fetch",
        message: errorMessage(err),
      });
      continue;
    }

    plan.toFetch.push({ entry, localPath });
    plan.expectedPaths.add(localPath);
  }

  return plan;
}

function walkTree(root: string): Promise<fsWalk.Entry[]> {
  return new Promise((resolvePromise, reject) => {
    fsWalk.walk(root, { followSymbolicLinks: false }, (error, entries) => {
      if (error) {
        reject(error);
      } else {
        resolvePromise(entries);
      }
    });
  });
}

function depth(basePath: string, path: string): number {
  return relative(basePath, path).split(sep).length;
}

/** Every non-directory under basePath (the LocalFileIndex for one pass). */
export async function listLocalFiles(basePath: string): Promise<string[]> {
  const entries = await walkTree(basePath);
  return entries.filter((e) => !e.dirent.isDirectory()).map((e) => e.path);
}

/** Delete local files that are neither expected nor protected. */
export async function pruneStaleFiles(
  basePath: string,
  expectedPaths: ReadonlySet<string>,
  protectedPaths: readonly string[],
  logger: Logger,
): Promise<{ deleted: string[]; failures: EntityFailure[] }> {
  const keep = new Set(protectedPaths.map((p) => resolve(p)));
  const deleted: string[] = [];
  const failures: EntityFailure[] = [];

  for (const path of await listLocalFiles(basePath)) {
    if (expectedPaths.has(path) || keep.has(path)) continue;

    try {
      await unlink(path);
      deleted.push(path);
      logger.info({ path }, "Removed file no longer present remotely");
    } catch (err) {
      failures.push({ path, operation: "delete", message: errorMessage(err) });
      logger.warn(
        { path, error: errorMessage(err) },
        "Failed to remove stale file",
      );
    }
  }

  return { deleted, failures };
}

/**
 * Remove directories left empty, deepest first, so that a parent emptied
 * by pruning its children is removed in the same pass. Never removes basePath.
 */
export async function pruneEmptyDirectories(
  basePath: string,
  logger: Logger,
): Promise<string[]> {
  const base = resolve(basePath);
  const directories = (await walkTree(base))
    .filter((e) => e.dirent.isDirectory())
    .map((e) => e.path)
    .filter((p) => p !== base)
    .sort((a, b) => depth(base, b) - depth(base, a));

  const removed: string[] = [];
  for (const dir of directories) {
    try {
      const children = await readdir(dir);
      if (children.length > 0) continue;
      await rmdir(dir);
      removed.push(dir);
      logger.debug({ path: dir }, "Removed empty directory");
    } catch (err) {
      logger.debug(
        { path: dir, error: errorMessage(err) },
        "Failed to remove empty directory",
      );
    }
  }
  return removed;
}

/**
 * Bring the local tree in line with a listing. Full mode also deletes stale
 * files and prunes empty directories; incremental mode only fetches.
 * Per-file failures are recorded in the report and never thrown.
 */
export async function reconcile(
  deps: ReconcilerDeps,
  entries: readonly RemoteEntry[],
  mode: SyncMode,
): Promise<ReconcileReport> {
  const { remote, logger } = deps;
  const basePath = resolve(deps.basePath);

  await mkdir(basePath, { recursive: true });

  const plan = buildPlan(entries, { basePath, remoteRoot: deps.remoteRoot });
  const report: ReconcileReport = {
    mode,
    fetched: [],
    unchanged: [],
    deleted: [],
    prunedDirectories: [],
    failures: [...plan.rejected],
  };

  for (const failure of plan.rejected) {
    logger.warn(
      { path: failure.path, error: failure.message },
      "Skipping remote entry",
    );
  }

  for (const { entry, localPath } of plan.toFetch) {
    const comparison = await compareLocal(entry, localPath);
    if (comparison.kind === "size" && comparison.reason === "hash-failed") {
      logger.warn(
        { path: localPath, error: comparison.error },
        "Failed to hash local file, falling back to size comparison",
      );
    }

    if (!needsFetch(comparison)) {
      report.unchanged.push(localPath);
      logger.debug({ path: entry.path, comparison: comparison.kind }, "Up to date");
      continue;
    }

    try {
      await remote.download(entry.path, localPath);
      report.fetched.push(localPath);
      logger.info({ path: entry.path, localPath }, "Downloaded file");
    } catch (err) {
      report.failures.push({
        path: entry.path,
        operation: "fetch",
        message: errorMessage(err),
      });
      logger.warn(
        { path: entry.path, error: errorMessage(err) },
        "Failed to download file",
      );
    }
  }

  if (mode === "incremental") {
    return report;
  }

  try {
    const pruned = await pruneStaleFiles(
      basePath,
      plan.expectedPaths,
      deps.protectedPaths ?? [],
      logger,
    );
    report.deleted = pruned.deleted;
    report.failures.push(...pruned.failures);
    report.prunedDirectories = await pruneEmptyDirectories(basePath, logger);
  } catch (err) {
    // The walk itself failed; nothing more can be pruned this pass
    report.failures.push({
      path: basePath,
      operation: "delete",
      message: errorMessage(err),
    });
    logger.warn(
      { path: basePath, error: errorMessage(err) },
      "Failed to scan local tree for deleted files",
    );
  }

  if (report.deleted.length > 0) {
    logger.info({ count: report.deleted.length }, "Removed deleted files");
  }

  return report;
}
