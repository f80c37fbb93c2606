export * from "./options";
export { CUTTER_BINARY, CUTTER_SEARCH_PATHS, buildCutterArgs, resolveCutterCommand } from "./command";
export {
  ANALYZING_STATUS,
  RENDERING_STATUS,
  ProgressReporter,
  estimateFromElapsed,
  parseProgressLine,
  type ProgressListener,
  type ProgressUpdate
} from "./progress";
export {
  DEFAULT_POLL_INTERVAL_MS,
  runCutter,
  spawnCutter,
  type CutterProcess,
  type CutterSpawner,
  type RunCutterRequest
} from "./runner";
export {
  CANCELLED_MESSAGE,
  SilenceCutWorker,
  type CleanRequest,
  type CleanResult,
  type FinishedListener,
  type SilenceCutWorkerOptions,
  type WorkerDependencies
} from "./worker";
export { checkTools, type ToolPaths, type ToolStatus } from "./tools";
