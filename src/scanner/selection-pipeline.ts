import type { ScanSettings } from "../config/types.js";
import {
  createGitignorePatternSet,
  type GitignorePatternSet,
} from "../ingest/gitignore-lite.js";
import { createNameMatcher, type NameMatcher } from "../ingest/name-matcher.js";
import { createPathMatcher, type PathMatcher } from "../ingest/path-matcher.js";
import { isOversized } from "../ingest/size-probe.js";
import type { FileCandidate } from "../ingest/types.js";
import type { Decision } from "./types.js";

export interface SelectionPipeline {
  decide(candidate: FileCandidate): Decision;
}

/**
 * Compile the rule classes once per project. Classes run in a fixed order,
 * gitignore, file name, path, size, and the first match is the decision.
 */
export function createSelectionPipeline(
  settings: ScanSettings,
  gitignorePatterns: readonly string[],
): SelectionPipeline {
  const gitignore = createGitignorePatternSet(gitignorePatterns);
  const names = createNameMatcher(settings);
  const paths = createPathMatcher(settings);
  return {
    decide: (candidate) =>
      decideWith(candidate, gitignore, names, paths, settings.maxFileSizeBytes),
  };
}

export function decide(
  candidate: FileCandidate,
  settings: ScanSettings,
  gitignorePatterns: readonly string[],
): Decision {
  return createSelectionPipeline(settings, gitignorePatterns).decide(candidate);
}

function decideWith(
  candidate: FileCandidate,
  gitignore: GitignorePatternSet,
  names: NameMatcher,
  paths: PathMatcher,
  maxBytes: number,
): Decision {
  const gitignorePattern = gitignore.findMatch(
    candidate.relativePath,
    candidate.name,
  );
  if (gitignorePattern !== null) {
    return { kind: "skip-gitignore", pattern: gitignorePattern };
  }

  const filePattern = names.findIgnoredFilePattern(candidate.name);
  if (filePattern !== null) {
    return { kind: "skip-file-pattern", pattern: filePattern };
  }

  const pathMatch = paths.matchPath(
    candidate.absolutePath,
    candidate.relativePath,
  );
  if (pathMatch) {
    return {
      kind: "skip-path-pattern",
      scope: pathMatch.scope,
      pattern: pathMatch.pattern,
    };
  }

  if (isOversized(candidate.sizeBytes, maxBytes)) {
    return {
      kind: "skip-too-large",
      sizeBytes: candidate.sizeBytes,
      maxBytes,
    };
  }

  return { kind: "include", sizeBytes: candidate.sizeBytes };
}

export function describeDecision(decision: Decision): string {
  switch (decision.kind) {
    case "include":
      return "included";
    case "skip-gitignore":
      return `gitignore pattern: ${decision.pattern}`;
    case "skip-file-pattern":
      return `matches ignore pattern: ${decision.pattern}`;
    case "skip-path-pattern":
      return `${decision.scope} path match: ${decision.pattern}`;
    case "skip-too-large":
      return `too large: ${decision.sizeBytes} > ${decision.maxBytes} bytes`;
  }
}
