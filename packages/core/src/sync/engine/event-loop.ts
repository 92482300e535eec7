import type { Logger } from "pino";
import { errorMessage } from "../../errors/catalog.js";
import type { CursorStore } from "../cursor.js";
import type {
  CycleOutcome,
  CycleRequest,
  EntityFailure,
  SyncError,
  SyncEvent,
  SyncStatus,
} from "../types.js";
import type { SyncPipeline } from "./pipeline.js";

export interface EventLoopOptions {
  /** Fold a remote-changed into an identical one still waiting (default: true) */
  coalesce?: boolean;
  /** Queue a full sync when the loop starts (default: false) */
  syncOnStart?: boolean;
  /** Queue a full sync on this interval; null disables (default: null) */
  fullSyncIntervalMs?: number | null;
}

export interface EventLoopDeps {
  pipeline: SyncPipeline;
  cursorStore: Pick<CursorStore, "load" | "clear">;
  logger: Logger;
}

export interface EventLoop {
  /** Begin consuming queued events */
  start(): void;

  /** Stop the timer and wait for the in-flight cycle; queued events stay queued */
  stop(): Promise<void>;

  /** Queue an event. Never blocks and never throws. */
  enqueue(event: SyncEvent): void;

  /**
   * Clear the stored cursor ahead of any queued events. Runs on the worker,
   * after the in-flight cycle, so that cycle cannot commit over it.
   */
  resetCursor(): Promise<void>;

  /** Resolves once the queue is empty and no cycle is running */
  drain(): Promise<void>;

  getStatus(): SyncStatus;

  readonly running: boolean;
}

const MAX_ERRORS = 10;

type QueueItem =
  | { kind: "event"; event: SyncEvent }
  | { kind: "reset-cursor"; resolve: () => void; reject: (err: unknown) => void };

function toRequest(event: SyncEvent): CycleRequest {
  switch (event.type) {
    case "remote-changed":
      return { mode: "auto" };
    case "remote-changed-with-cursor":
      return { mode: "incremental", cursor: event.cursor };
    case "force-full-sync":
      return { mode: "full" };
  }
}

function failureStage(failure: EntityFailure): SyncError["stage"] {
  return failure.operation === "copy" ? "mirroring" : "reconciling";
}

export function createEventLoop(
  deps: EventLoopDeps,
  options?: EventLoopOptions,
): EventLoop {
  const { pipeline, logger } = deps;
  const coalesce = options?.coalesce ?? true;
  const syncOnStart = options?.syncOnStart ?? false;
  const fullSyncIntervalMs = options?.fullSyncIntervalMs ?? null;

  const queue: QueueItem[] = [];
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let isRunning = false;
  let busy = false;
  let consuming: Promise<void> | null = null;
  let lastSync: string | null = null;
  let lastOutcome: CycleOutcome | null = null;
  let cursor: string | null = null;
  let errors: SyncError[] = [];

  function pushError(error: SyncError): void {
    errors.push(error);
    if (errors.length > MAX_ERRORS) {
      errors = errors.slice(-MAX_ERRORS);
    }
  }

  function record(outcome: CycleOutcome): void {
    lastOutcome = outcome;
    lastSync = outcome.finishedAt;

    for (const failure of outcome.failures) {
      pushError({
        stage: failureStage(failure),
        path: failure.path,
        message: `${failure.operation} failed: ${failure.message}`,
        timestamp: outcome.finishedAt,
      });
    }
    if (outcome.status === "aborted") {
      pushError({
        stage: outcome.stage,
        path: null,
        message: outcome.error ?? "Sync cycle aborted",
        timestamp: outcome.finishedAt,
      });
    }
  }

  async function runCycle(event: SyncEvent): Promise<void> {
    logger.debug({ event: event.type }, "Processing sync event");
    try {
      record(await pipeline.run(toRequest(event)));
    } catch (err) {
      // The pipeline reports failures in its outcome; this is a bug guard
      pushError({
        stage: null,
        path: null,
        message: `Sync cycle failed: ${errorMessage(err)}`,
        timestamp: new Date().toISOString(),
      });
      logger.error({ error: errorMessage(err) }, "Sync cycle failed");
    }

    cursor = await deps.cursorStore.load();
  }

  async function clearCursor(): Promise<void> {
    await deps.cursorStore.clear();
    cursor = null;
    logger.info("Sync cursor reset");
  }

  async function consume(): Promise<void> {
    while (isRunning) {
      const item = queue.shift();
      if (!item) return;
      if (item.kind === "reset-cursor") {
        await clearCursor().then(item.resolve, item.reject);
        continue;
      }
      busy = true;
      try {
        await runCycle(item.event);
      } finally {
        busy = false;
      }
    }
  }

  function schedule(): void {
    if (!isRunning || consuming || queue.length === 0) return;
    consuming = consume()
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, "Event consumer failed");
      })
      .finally(() => {
        consuming = null;
        schedule();
      });
  }

  function enqueue(event: SyncEvent): void {
    const tail = queue.length > 0 ? queue[queue.length - 1] : null;
    if (
      coalesce &&
      event.type === "remote-changed" &&
      tail?.kind === "event" &&
      tail.event.type === "remote-changed"
    ) {
      logger.debug("Coalesced change notification into queued event");
      return;
    }

    queue.push({ kind: "event", event });
    logger.debug({ event: event.type, queued: queue.length }, "Queued sync event");
    schedule();
  }

  function clearIntervalTimer(): void {
    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }
  }

  const loop: EventLoop = {
    get running() {
      return isRunning;
    },

    start() {
      if (isRunning) return; // Idempotent
      isRunning = true;
      logger.info(
        { coalesce, syncOnStart, fullSyncIntervalMs },
        "Sync event loop started",
      );

      if (syncOnStart) {
        enqueue({ type: "force-full-sync" });
      }

      if (fullSyncIntervalMs !== null && intervalId === null) {
        intervalId = setInterval(() => {
          enqueue({ type: "force-full-sync" });
        }, fullSyncIntervalMs);
      }

      schedule();
    },

    async stop() {
      clearIntervalTimer();
      isRunning = false;

      // Wait for any in-flight cycle to complete
      if (consuming) {
        await consuming;
      }
      // Resets never wait for a restart; queued events do
      for (let i = queue.length - 1; i >= 0; i--) {
        const item = queue[i];
        if (item.kind === "reset-cursor") {
          queue.splice(i, 1);
          await clearCursor().then(item.resolve, item.reject);
        }
      }
      logger.info({ queued: queue.length }, "Sync event loop stopped");
    },

    enqueue,

    async resetCursor() {
      if (!isRunning) {
        // No worker to hand off to; wait out a cycle still finishing after stop()
        if (consuming) await consuming;
        await clearCursor();
        return;
      }
      await new Promise<void>((resolve, reject) => {
        queue.unshift({ kind: "reset-cursor", resolve, reject });
        schedule();
      });
    },

    async drain() {
      while (consuming) {
        await consuming;
      }
    },

    getStatus(): SyncStatus {
      return {
        running: isRunning,
        busy,
        queued: queue.length,
        lastSync,
        lastOutcome,
        cursor,
        errors: [...errors],
      };
    },
  };

  return loop;
}
