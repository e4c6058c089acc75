import type { Decision, RunStats } from "./types.js";

export function emptyStats(): RunStats {
  return {
    filesProcessed: 0,
    filesSkipped: 0,
    gitignoreSkipped: 0,
    prunedEntries: 0,
    totalBytes: 0,
    readErrors: 0,
  };
}

export function foldDecision(stats: RunStats, decision: Decision): RunStats {
  if (decision.kind === "include") {
    return {
      ...stats,
      filesProcessed: stats.filesProcessed + 1,
      totalBytes: stats.totalBytes + decision.sizeBytes,
    };
  }
  return {
    ...stats,
    filesSkipped: stats.filesSkipped + 1,
    gitignoreSkipped:
      stats.gitignoreSkipped + (decision.kind === "skip-gitignore" ? 1 : 0),
  };
}

/** A pruned directory counts once, however many files it holds. */
export function foldPruned(stats: RunStats): RunStats {
  return {
    ...stats,
    filesSkipped: stats.filesSkipped + 1,
    prunedEntries: stats.prunedEntries + 1,
  };
}

export function recordReadError(stats: RunStats): RunStats {
  return { ...stats, readErrors: stats.readErrors + 1 };
}

export function mergeStats(a: RunStats, b: RunStats): RunStats {
  return {
    filesProcessed: a.filesProcessed + b.filesProcessed,
    filesSkipped: a.filesSkipped + b.filesSkipped,
    gitignoreSkipped: a.gitignoreSkipped + b.gitignoreSkipped,
    prunedEntries: a.prunedEntries + b.prunedEntries,
    totalBytes: a.totalBytes + b.totalBytes,
    readErrors: a.readErrors + b.readErrors,
  };
}
