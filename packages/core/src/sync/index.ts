export type {
  SyncMode,
  PlannedFile,
  ReconciliationPlan,
  EntityFailure,
  ReconcileReport,
  SyncEvent,
  CycleRequest,
  CycleStage,
  CycleStatus,
  CycleOutcome,
  SyncStatus,
  SyncError,
} from "./types.js";
export {
  createCursorStore,
  DEFAULT_CURSOR_FILE,
  type CursorStore,
} from "./cursor.js";
export { localPathFor, relativeRemotePath } from "./paths.js";
export { compareLocal, needsFetch, type LocalComparison } from "./compare.js";
export {
  buildPlan,
  listLocalFiles,
  pruneEmptyDirectories,
  pruneStaleFiles,
  reconcile,
  type BuiltPlan,
  type PlanOptions,
  type ReconcilerDeps,
} from "./reconciler.js";
export {
  runBuild,
  DEFAULT_BUILD_TIMEOUT_MS,
  type BuildOptions,
  type BuildResult,
} from "./engine/build.js";
export {
  mirrorOutputs,
  type CopyRule,
  type MirrorResult,
} from "./engine/mirror.js";
export {
  createSyncPipeline,
  type SyncPipeline,
  type SyncPipelineDeps,
} from "./engine/pipeline.js";
export {
  createEventLoop,
  type EventLoop,
  type EventLoopDeps,
  type EventLoopOptions,
} from "./engine/event-loop.js";
