/**
 * One sync cycle: list the remote, reconcile the local tree, build, copy the
 * build output, then persist the cursor. Stages run strictly in order and a
 * stage-fatal failure ends the cycle without committing the cursor, so the
 * next cycle starts again from the last successful point.
 */

import type { Logger } from "pino";
import { ListingFailedError, errorMessage } from "../../errors/catalog.js";
import type { RemoteEntry, RemoteSource } from "../../remote/types.js";
import type { CursorStore } from "../cursor.js";
import { reconcile } from "../reconciler.js";
import type {
  CycleOutcome,
  CycleRequest,
  CycleStage,
  EntityFailure,
  ReconcileReport,
  SyncMode,
} from "../types.js";
import { runBuild, type BuildOptions } from "./build.js";
import { mirrorOutputs, type CopyRule } from "./mirror.js";

export interface SyncPipelineDeps {
  remote: RemoteSource;
  cursorStore: CursorStore;
  logger: Logger;
  /** Local directory mirroring the remote root */
  basePath: string;
  remoteRoot: string;
  build: BuildOptions;
  copyRules: readonly CopyRule[];
  /** Notified when each stage is entered */
  onStage?: (stage: CycleStage) => void;
}

export interface SyncPipeline {
  /** Run one cycle. Always resolves; failures are reported in the outcome. */
  run(request: CycleRequest): Promise<CycleOutcome>;
}

interface Listing {
  entries: RemoteEntry[];
  cursor: string;
}

export function createSyncPipeline(deps: SyncPipelineDeps): SyncPipeline {
  const { remote, cursorStore, logger } = deps;

  async function resolveRequest(
    request: CycleRequest,
  ): Promise<{ mode: SyncMode; cursor: string | null }> {
    switch (request.mode) {
      case "full":
        return { mode: "full", cursor: null };
      case "incremental":
        return { mode: "incremental", cursor: request.cursor };
      case "auto": {
        const cursor = await cursorStore.load();
        return cursor
          ? { mode: "incremental", cursor }
          : { mode: "full", cursor: null };
      }
    }
  }

  async function list(mode: SyncMode, cursor: string | null): Promise<Listing> {
    try {
      if (mode === "incremental" && cursor !== null) {
        return await remote.changesSince(cursor);
      }
      return await remote.list(deps.remoteRoot, true);
    } catch (err) {
      throw new ListingFailedError(errorMessage(err));
    }
  }

  async function run(request: CycleRequest): Promise<CycleOutcome> {
    const startedAt = new Date().toISOString();
    let stage: CycleStage = "listing";
    let mode: SyncMode = request.mode === "incremental" ? "incremental" : "full";
    let report: ReconcileReport | null = null;
    const failures: EntityFailure[] = [];
    const skipped: CycleStage[] = [];

    const enter = (next: CycleStage) => {
      stage = next;
      logger.debug({ stage, mode }, "Entering sync stage");
      deps.onStage?.(next);
    };

    const finish = (
      status: CycleOutcome["status"],
      cursorCommitted: boolean,
      error?: string,
    ): CycleOutcome => {
      const outcome: CycleOutcome = {
        status,
        mode,
        stage,
        skipped,
        report,
        failures,
        cursorCommitted,
        startedAt,
        finishedAt: new Date().toISOString(),
        ...(error !== undefined && { error }),
      };
      if (status === "aborted") {
        logger.error({ mode, stage, error }, "Sync cycle aborted");
      } else {
        logger.info(
          {
            mode,
            status,
            fetched: report?.fetched.length ?? 0,
            deleted: report?.deleted.length ?? 0,
            failures: failures.length,
          },
          "Sync cycle complete",
        );
      }
      return outcome;
    };

    enter("listing");
    let listing: Listing;
    try {
      const resolved = await resolveRequest(request);
      mode = resolved.mode;
      logger.info({ mode }, "Starting sync cycle");
      listing = await list(mode, resolved.cursor);
    } catch (err) {
      return finish("aborted", false, errorMessage(err));
    }

    enter("reconciling");
    try {
      report = await reconcile(
        {
          remote,
          logger,
          basePath: deps.basePath,
          remoteRoot: deps.remoteRoot,
          protectedPaths: [cursorStore.path],
        },
        listing.entries,
        mode,
      );
      failures.push(...report.failures);
    } catch (err) {
      return finish("aborted", false, errorMessage(err));
    }

    const changedFiles = listing.entries.some((e) => e.isFile);
    if (mode === "incremental" && !changedFiles) {
      logger.info("No file changes since last cursor, skipping build");
      skipped.push("building", "mirroring");
    } else {
      enter("building");
      try {
        await runBuild(deps.build, logger);
      } catch (err) {
        return finish("aborted", false, errorMessage(err));
      }

      enter("mirroring");
      const mirrored = await mirrorOutputs(deps.copyRules, logger);
      failures.push(...mirrored.failures);
    }

    enter("committing-cursor");
    // A change feed never repeats an entry once its cursor has moved past it
    const reconcileFailed = failures.some((f) => f.operation !== "copy");
    if (reconcileFailed) {
      logger.warn(
        { failures: failures.length },
        "Keeping previous cursor so failed entries are retried",
      );
      return finish("partial", false);
    }
    try {
      await cursorStore.save(listing.cursor);
    } catch (err) {
      return finish("aborted", false, errorMessage(err));
    }

    return finish(failures.length > 0 ? "partial" : "success", true);
  }

  return { run };
}
