import type { RunStats } from "../scanner/types.js";
import {
  formatBytes,
  formatTimestamp,
  numberLines,
} from "./report-utils.js";
import type { ReportSink } from "./sinks.js";
import type {
  IncludedFileSection,
  OversizedFileSection,
  ReportHeader,
  ReportWriter,
} from "./types.js";

const RULE_WIDTH = 63;
const FRAME_WIDTH = 61;
const HEAVY_RULE = "═".repeat(RULE_WIDTH);
const FRAME_RULE = "─".repeat(FRAME_WIDTH);

export const BINARY_PLACEHOLDER = "│ [Binary file - omitted]";

/** Append each rendered block to the sink as soon as it is produced. */
export function createReportWriter(sink: ReportSink): ReportWriter {
  const emit = async (lines: readonly string[]): Promise<void> => {
    await sink.write(lines.map((line) => `${line}\n`).join(""));
  };

  return {
    writeHeader: (header) => emit(renderHeader(header)),
    writeTree: (treeLines) => emit(renderTreeSection(treeLines)),
    writeContentsHeading: () => emit(renderContentsHeading()),
    writeIncludedFile: (section) => emit(renderIncludedFile(section)),
    writeOversizedFile: (section) => emit(renderOversizedFile(section)),
    writeSummary: (stats) => emit(renderSummary(stats)),
  };
}

export function renderHeader(header: ReportHeader): string[] {
  return [
    `╔${HEAVY_RULE}╗`,
    `║ PROJECT: ${header.projectName}`,
    `║ Type: ${header.projectTypes.join(", ")}`,
    `║ Date: ${formatTimestamp(header.generatedAt)}`,
    `╚${HEAVY_RULE}╝`,
    "",
  ];
}

export function renderTreeSection(treeLines: readonly string[]): string[] {
  return ["DIRECTORY STRUCTURE", HEAVY_RULE, ...treeLines, "", ""];
}

export function renderContentsHeading(): string[] {
  return ["FILE CONTENTS", HEAVY_RULE, ""];
}

export function renderIncludedFile(section: IncludedFileSection): string[] {
  const lines = [
    `┌${FRAME_RULE}`,
    `│ ./${section.relativePath}`,
    `│ Size: ${formatBytes(section.sizeBytes)}`,
    `├${FRAME_RULE}`,
  ];

  switch (section.content.kind) {
    case "text":
      lines.push(...numberLines(section.content.text));
      break;
    case "binary":
      lines.push(BINARY_PLACEHOLDER);
      break;
    case "unreadable":
      lines.push(`│ [Error reading file: ${section.content.message}]`);
      break;
  }

  lines.push(`└${FRAME_RULE}`, "");
  return lines;
}

export function renderOversizedFile(section: OversizedFileSection): string[] {
  const actual = formatBytes(section.sizeBytes);
  const limit = formatBytes(section.maxBytes);
  return [
    `┌${FRAME_RULE}`,
    `│ ./${section.relativePath}`,
    `│ SKIPPED: too large (${actual} > ${limit})`,
    `└${FRAME_RULE}`,
    "",
  ];
}

export function renderSummary(stats: RunStats): string[] {
  return [
    "",
    HEAVY_RULE,
    "SUMMARY",
    HEAVY_RULE,
    `  Files processed: ${stats.filesProcessed}`,
    `  Files skipped: ${stats.filesSkipped}`,
    `  Skipped via .gitignore: ${stats.gitignoreSkipped}`,
    `  Pruned entries: ${stats.prunedEntries}`,
    `  Total size: ${formatBytes(stats.totalBytes)}`,
    `  Read errors: ${stats.readErrors}`,
    HEAVY_RULE,
  ];
}
