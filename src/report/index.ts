export {
  BINARY_PLACEHOLDER,
  createReportWriter,
  renderContentsHeading,
  renderHeader,
  renderIncludedFile,
  renderOversizedFile,
  renderSummary,
  renderTreeSection,
} from "./report-writer.js";
export {
  formatBytes,
  formatTimestamp,
  numberLines,
  stripLineNumbers,
} from "./report-utils.js";
export { createMemorySink, openFileSink } from "./sinks.js";
export type { FileReportSink, MemoryReportSink, ReportSink } from "./sinks.js";
export { renderTree } from "./tree-renderer.js";
export type {
  IncludedFileSection,
  OversizedFileSection,
  ReportHeader,
  ReportWriter,
} from "./types.js";
