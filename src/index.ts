export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./report/index.js";
export * from "./scanner/index.js";
export { runScanCommand, discoverProjects } from "./cli/scan-command.js";
export type {
  ProjectOutcome,
  ProjectRef,
  ScanOptions,
  ScanResult,
} from "./cli/scan-command.js";
export { createLogger } from "./cli/logger.js";
export type { Logger, LoggerOptions } from "./cli/logger.js";
