export { walkProject } from "./directory-walker.js";
export { readFileContent } from "./file-reader.js";
export {
  createGitignorePatternSet,
  findGitignoreMatch,
  isIgnored,
  loadGitignorePatterns,
  parseGitignore,
} from "./gitignore-lite.js";
export type { GitignorePatternSet } from "./gitignore-lite.js";
export { compileGlobs, createGlobPattern } from "./glob-pattern.js";
export type { GlobPattern } from "./glob-pattern.js";
export {
  createNameMatcher,
  findMatchingPattern,
  matchesAnyPattern,
} from "./name-matcher.js";
export type { NameMatcher } from "./name-matcher.js";
export { createPathMatcher } from "./path-matcher.js";
export type { PathMatch, PathMatcher } from "./path-matcher.js";
export { detectProjectTypes, GENERIC_PROJECT_TYPE } from "./project-detector.js";
export { compareCodeUnits } from "./path-order.js";
export { createPruneRules } from "./prune-rules.js";
export { loadTarget } from "./repo-loader.js";
export {
  DEFAULT_MAX_FILE_SIZE_BYTES,
  isOversized,
  probeSize,
} from "./size-probe.js";
export type {
  FileCandidate,
  FileContent,
  PrunedKind,
  ScanTarget,
  WalkOptions,
} from "./types.js";
