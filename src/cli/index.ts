#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
  readEnvSettings,
  type SettingsOverrides,
} from "../config/settings.js";
import type { EnvSettings } from "../config/types.js";
import { parseByteCount, splitPatternList } from "../config/validation.js";
import { createLogger, errorMessage } from "./logger.js";
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_OUTPUT_SUFFIX,
  runScanCommand,
} from "./scan-command.js";

type GlobalCliOptions = {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};

interface ScanCliOptions {
  readonly outDir?: string;
  readonly suffix?: string;
  readonly maxSize?: string;
  readonly gitignore: boolean;
  readonly ignoreFiles?: string;
  readonly ignoreDirs?: string;
  readonly ignorePaths?: string;
  readonly ignoreAbsolutePaths?: string;
  readonly single?: boolean;
}

const DEFAULT_TARGET_DIR = "input";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("repo-snapshot")
  .description(
    "Write a line-numbered plain-text snapshot of each project in a directory",
  )
  .version(toolVersion)
  .option("--verbose", "Print every skipped file with its reason")
  .option("--quiet", "Suppress non-essential output");

program
  .command("scan", { isDefault: true })
  .argument("[target]", "Directory of projects, a project, or a git URL")
  .option("--out-dir <dir>", "Directory for the reports")
  .option("--suffix <suffix>", "Report file name suffix")
  .option("--max-size <bytes>", "Skip files larger than this many bytes")
  .option("--no-gitignore", "Ignore each project's .gitignore")
  .option("--ignore-files <patterns>", "Extra file globs, pipe-delimited")
  .option("--ignore-dirs <patterns>", "Extra directory globs, pipe-delimited")
  .option("--ignore-paths <patterns>", "Relative path substrings to skip")
  .option(
    "--ignore-absolute-paths <patterns>",
    "Absolute path prefixes to skip",
  )
  .option("--single", "Scan the target as one project")
  .action(async (target: string | undefined, options: ScanCliOptions) => {
    const globals = program.opts<GlobalCliOptions>();
    let env: EnvSettings;
    try {
      env = readEnvSettings(process.env);
    } catch (error) {
      await createLogger().error(errorMessage(error));
      process.exitCode = 1;
      return;
    }

    const logger = createLogger({
      verbose: globals.verbose ?? env.verbose ?? false,
      quiet: globals.quiet ?? false,
    });

    try {
      const result = await runScanCommand(
        {
          target: target ?? env.targetDir ?? DEFAULT_TARGET_DIR,
          outDir: options.outDir ?? env.outputDir ?? DEFAULT_OUTPUT_DIR,
          suffix:
            options.suffix ?? env.outputFileSuffix ?? DEFAULT_OUTPUT_SUFFIX,
          single: Boolean(options.single),
          overrides: buildOverrides(options, env),
        },
        logger,
      );
      if (result.failed > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      await logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

function buildOverrides(
  options: ScanCliOptions,
  env: EnvSettings,
): SettingsOverrides {
  return {
    maxFileSizeBytes: options.maxSize
      ? parseByteCount(options.maxSize, "--max-size")
      : env.maxFileSizeBytes,
    useGitignore: options.gitignore ? env.useGitignore : false,
    ignoreFilesExtra: [
      ...env.ignoreFilesExtra,
      ...splitPatternList(options.ignoreFiles),
    ],
    ignoreDirsExtra: [
      ...env.ignoreDirsExtra,
      ...splitPatternList(options.ignoreDirs),
    ],
    ignorePaths: [...env.ignorePaths, ...splitPatternList(options.ignorePaths)],
    ignoreAbsolutePaths: [
      ...env.ignoreAbsolutePaths,
      ...splitPatternList(options.ignoreAbsolutePaths),
    ],
  };
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

await program.parseAsync(process.argv);
