export { scanProject } from "./project-scanner.js";
export type { ScanProjectOptions } from "./project-scanner.js";
export {
  emptyStats,
  foldDecision,
  foldPruned,
  mergeStats,
  recordReadError,
} from "./run-stats.js";
export {
  createSelectionPipeline,
  decide,
  describeDecision,
} from "./selection-pipeline.js";
export type { SelectionPipeline } from "./selection-pipeline.js";
export type {
  Decision,
  DecisionKind,
  DecisionObserver,
  PruneObserver,
  RunStats,
  SkipDecision,
} from "./types.js";
