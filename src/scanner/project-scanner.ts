import type { ScanConfig } from "../config/types.js";
import { walkProject } from "../ingest/directory-walker.js";
import { readFileContent } from "../ingest/file-reader.js";
import { loadGitignorePatterns } from "../ingest/gitignore-lite.js";
import { createNameMatcher } from "../ingest/name-matcher.js";
import { detectProjectTypes } from "../ingest/project-detector.js";
import { createReportWriter } from "../report/report-writer.js";
import type { ReportSink } from "../report/sinks.js";
import { renderTree } from "../report/tree-renderer.js";
import type { OversizedFileSection } from "../report/types.js";
import {
  emptyStats,
  foldDecision,
  foldPruned,
  recordReadError,
} from "./run-stats.js";
import { createSelectionPipeline } from "./selection-pipeline.js";
import type { DecisionObserver, PruneObserver, RunStats } from "./types.js";

export interface ScanProjectOptions {
  /** Report timestamp; defaults to the current time. */
  readonly now?: Date;
  readonly onDecision?: DecisionObserver;
  readonly onPrune?: PruneObserver;
}

/**
 * Write one project's report to `sink` in a single pass and return the
 * run's counters. Included files are written as the walk reaches them;
 * oversized notices follow once the walk is done, then the summary.
 */
export async function scanProject(
  config: ScanConfig,
  sink: ReportSink,
  options: ScanProjectOptions = {},
): Promise<RunStats> {
  const writer = createReportWriter(sink);
  const projectTypes = await detectProjectTypes(config.projectRoot);
  const gitignorePatterns = await loadGitignorePatterns(
    config.projectRoot,
    config.useGitignore,
  );
  const pipeline = createSelectionPipeline(config, gitignorePatterns);
  const nameMatcher = createNameMatcher(config);

  await writer.writeHeader({
    projectName: config.projectName,
    projectTypes,
    generatedAt: options.now ?? new Date(),
  });
  await writer.writeTree(
    await renderTree(config.projectRoot, config.ignoreDirPatterns),
  );
  await writer.writeContentsHeading();

  let stats = emptyStats();
  const oversized: OversizedFileSection[] = [];
  const candidates = walkProject(config.projectRoot, {
    ignoreDirPatterns: config.ignoreDirPatterns,
    isSelectable: (fileName) => nameMatcher.isSelectable(fileName),
    onPrune: async (relativePath, kind) => {
      stats = foldPruned(stats);
      await options.onPrune?.(relativePath, kind);
    },
  });

  for await (const candidate of candidates) {
    const decision = pipeline.decide(candidate);
    await options.onDecision?.(candidate, decision);
    stats = foldDecision(stats, decision);

    if (decision.kind === "skip-too-large") {
      oversized.push({
        relativePath: candidate.relativePath,
        sizeBytes: decision.sizeBytes,
        maxBytes: decision.maxBytes,
      });
      continue;
    }
    if (decision.kind !== "include") {
      continue;
    }

    const content = await readFileContent(candidate.absolutePath);
    if (content.kind === "unreadable") {
      stats = recordReadError(stats);
    }
    await writer.writeIncludedFile({
      relativePath: candidate.relativePath,
      sizeBytes: decision.sizeBytes,
      content,
    });
  }

  for (const section of oversized) {
    await writer.writeOversizedFile(section);
  }
  await writer.writeSummary(stats);
  return stats;
}
