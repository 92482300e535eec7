import type { RemoteEntry } from "../remote/types.js";

export type SyncMode = "full" | "incremental";

/** A remote file entry paired with its local target. */
export interface PlannedFile {
  entry: RemoteEntry;
  localPath: string;
}

/** Fetch candidates and the full expected local state for one cycle. */
export interface ReconciliationPlan {
  toFetch: PlannedFile[];
  expectedPaths: Set<string>;
}

export interface EntityFailure {
  path: string;
  operation: "fetch" | "delete" | "copy";
  message: string;
}

export interface ReconcileReport {
  mode: SyncMode;
  fetched: string[];
  unchanged: string[];
  deleted: string[];
  prunedDirectories: string[];
  failures: EntityFailure[];
}

/** Events accepted from the webhook and admin front ends */
export type SyncEvent =
  | { type: "remote-changed" }
  | { type: "remote-changed-with-cursor"; cursor: string }
  | { type: "force-full-sync" };

/** What a pipeline cycle should do */
export type CycleRequest =
  | { mode: "auto" }
  | { mode: "incremental"; cursor: string }
  | { mode: "full" };

export type CycleStage =
  | "listing"
  | "reconciling"
  | "building"
  | "mirroring"
  | "committing-cursor";

export type CycleStatus = "success" | "partial" | "aborted";

export interface CycleOutcome {
  status: CycleStatus;
  mode: SyncMode;
  /** Last stage entered */
  stage: CycleStage;
  skipped: CycleStage[];
  report: ReconcileReport | null;
  failures: EntityFailure[];
  cursorCommitted: boolean;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  error?: string;
}

/** Event loop status for GET /admin/status */
export interface SyncStatus {
  running: boolean;
  busy: boolean;
  queued: number;
  lastSync: string | null; // ISO 8601
  lastOutcome: CycleOutcome | null;
  cursor: string | null;
  errors: SyncError[];
}

export interface SyncError {
  stage: CycleStage | null;
  path: string | null;
  message: string;
  timestamp: string;
}
