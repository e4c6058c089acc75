import fs from "node:fs/promises";
import path from "node:path";
import { loadScannerDefaults } from "../config/defaults.js";
import { loadProjectConfig } from "../config/project-config.js";
import {
  applyProjectConfig,
  buildScanSettings,
  createScanConfig,
  type SettingsOverrides,
} from "../config/settings.js";
import type { ScanSettings } from "../config/types.js";
import { compareCodeUnits } from "../ingest/path-order.js";
import { loadTarget } from "../ingest/repo-loader.js";
import { formatBytes } from "../report/report-utils.js";
import { openFileSink } from "../report/sinks.js";
import { scanProject } from "../scanner/project-scanner.js";
import { emptyStats, mergeStats } from "../scanner/run-stats.js";
import { describeDecision } from "../scanner/selection-pipeline.js";
import type { RunStats } from "../scanner/types.js";
import { errorMessage, type Logger } from "./logger.js";

export const DEFAULT_OUTPUT_SUFFIX = "_snapshot.txt";
export const DEFAULT_OUTPUT_DIR = "output";

export interface ScanOptions {
  readonly target: string;
  readonly outDir?: string;
  readonly suffix?: string;
  /** Treat the target as one project instead of a folder of projects. */
  readonly single?: boolean;
  readonly overrides?: SettingsOverrides;
  readonly defaultsFile?: string;
  readonly now?: Date;
}

export interface ProjectOutcome {
  readonly name: string;
  readonly rootPath: string;
  readonly outputPath: string;
  readonly stats?: RunStats;
  readonly error?: string;
}

export interface ScanResult {
  readonly projects: readonly ProjectOutcome[];
  readonly totals: RunStats;
  readonly failed: number;
}

export interface ProjectRef {
  readonly name: string;
  readonly rootPath: string;
}

export async function runScanCommand(
  options: ScanOptions,
  logger: Logger,
): Promise<ScanResult> {
  const defaults = await loadScannerDefaults(options.defaultsFile);
  const settings = buildScanSettings(defaults, options.overrides);
  const target = await loadTarget(options.target);
  const outDir = path.resolve(options.outDir ?? DEFAULT_OUTPUT_DIR);
  const suffix = options.suffix ?? DEFAULT_OUTPUT_SUFFIX;

  try {
    const single = Boolean(options.single) || target.source === "git";
    let projects = single
      ? [projectRefFor(target.rootPath)]
      : await discoverProjects(target.rootPath, outDir);
    if (projects.length === 0) {
      await logger.info(
        "No subdirectories found; scanning the target as a single project.",
      );
      projects = [projectRefFor(target.rootPath)];
    }

    await logger.info(`Target: ${target.repoUrl ?? target.rootPath}`);
    await logger.info(`Output directory: ${outDir}`);
    await logger.info(
      `Max file size: ${formatBytes(settings.maxFileSizeBytes)}, .gitignore: ${settings.useGitignore ? "on" : "off"}`,
    );

    const outcomes: ProjectOutcome[] = [];
    for (const [index, project] of projects.entries()) {
      await logger.info(`[${index + 1}/${projects.length}] ${project.name}`);
      const outcome = await scanOneProject(
        project,
        settings,
        path.join(outDir, `${project.name}${suffix}`),
        options.now,
        logger,
      );
      outcomes.push(outcome);
    }

    const totals = outcomes.reduce(
      (acc, outcome) => (outcome.stats ? mergeStats(acc, outcome.stats) : acc),
      emptyStats(),
    );
    const failed = outcomes.filter((outcome) => outcome.error).length;
    await logger.info(
      `Done: ${outcomes.length - failed}/${outcomes.length} projects, ${totals.filesProcessed} files processed, ${totals.filesSkipped} skipped, ${formatBytes(totals.totalBytes)} total`,
    );
    return { projects: outcomes, totals, failed };
  } finally {
    await target.cleanup?.();
  }
}

async function scanOneProject(
  project: ProjectRef,
  runSettings: ScanSettings,
  outputPath: string,
  now: Date | undefined,
  logger: Logger,
): Promise<ProjectOutcome> {
  try {
    const projectConfig = await loadProjectConfig(project.rootPath);
    if (projectConfig) {
      await logger.info(`  Using ${path.basename(projectConfig.filePath)}`);
    }
    const settings = projectConfig
      ? applyProjectConfig(runSettings, projectConfig.config)
      : runSettings;
    const config = createScanConfig(settings, {
      projectRoot: project.rootPath,
      projectName: project.name,
      outputPath,
    });

    const sink = await openFileSink(config.outputPath);
    let stats: RunStats;
    try {
      stats = await scanProject(config, sink, {
        now,
        onDecision: async (candidate, decision) => {
          if (decision.kind !== "include") {
            await logger.verbose(
              `Skipping ${candidate.relativePath} (${describeDecision(decision)})`,
            );
          }
        },
        onPrune: async (relativePath, kind) => {
          await logger.verbose(`Pruned ${kind} ${relativePath}`);
        },
      });
    } finally {
      await sink.close();
    }

    await logger.info(
      `  Processed: ${stats.filesProcessed}, skipped: ${stats.filesSkipped} (.gitignore: ${stats.gitignoreSkipped}), size: ${formatBytes(stats.totalBytes)}`,
    );
    await logger.info(`  Saved: ${outputPath}`);
    return { name: project.name, rootPath: project.rootPath, outputPath, stats };
  } catch (error) {
    const message = errorMessage(error);
    await logger.error(`Failed to scan ${project.name}: ${message}`);
    return {
      name: project.name,
      rootPath: project.rootPath,
      outputPath,
      error: message,
    };
  }
}

/**
 * Each visible subdirectory of the target is a project, sorted. Only the
 * output directory is left out; ignore globs apply inside projects.
 */
export async function discoverProjects(
  targetRoot: string,
  outDir?: string,
): Promise<ProjectRef[]> {
  const entries = await fs.readdir(targetRoot, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort(compareCodeUnits)
    .map((name) => ({ name, rootPath: path.join(targetRoot, name) }))
    .filter((project) => project.rootPath !== outDir);
}

function projectRefFor(rootPath: string): ProjectRef {
  return { name: path.basename(rootPath), rootPath };
}
