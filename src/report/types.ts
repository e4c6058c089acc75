import type { FileContent } from "../ingest/types.js";
import type { RunStats } from "../scanner/types.js";

export interface ReportHeader {
  readonly projectName: string;
  readonly projectTypes: readonly string[];
  readonly generatedAt: Date;
}

export interface IncludedFileSection {
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly content: FileContent;
}

export interface OversizedFileSection {
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly maxBytes: number;
}

export interface ReportWriter {
  writeHeader(header: ReportHeader): Promise<void>;
  writeTree(treeLines: readonly string[]): Promise<void>;
  writeContentsHeading(): Promise<void>;
  writeIncludedFile(section: IncludedFileSection): Promise<void>;
  writeOversizedFile(section: OversizedFileSection): Promise<void>;
  writeSummary(stats: RunStats): Promise<void>;
}
