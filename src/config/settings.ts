import type {
  EnvSettings,
  ProjectConfigFile,
  ScanConfig,
  ScannerDefaults,
  ScanSettings,
} from "./types.js";
import {
  parseBooleanFlag,
  parseByteCount,
  splitPatternList,
} from "./validation.js";

export interface SettingsOverrides {
  readonly maxFileSizeBytes?: number;
  readonly useGitignore?: boolean;
  readonly ignoreFilesExtra?: readonly string[];
  readonly ignoreDirsExtra?: readonly string[];
  readonly ignorePaths?: readonly string[];
  readonly ignoreAbsolutePaths?: readonly string[];
}

export interface ProjectLocation {
  readonly projectRoot: string;
  readonly projectName: string;
  readonly outputPath: string;
}

export function readEnvSettings(env: NodeJS.ProcessEnv): EnvSettings {
  return {
    targetDir: nonEmpty(env.TARGET_DIR),
    outputDir: nonEmpty(env.OUTPUT_DIR),
    outputFileSuffix: nonEmpty(env.OUTPUT_FILE_SUFFIX),
    maxFileSizeBytes: env.MAX_SIZE_BYTES
      ? parseByteCount(env.MAX_SIZE_BYTES, "MAX_SIZE_BYTES")
      : undefined,
    useGitignore: env.USE_GITIGNORE
      ? parseBooleanFlag(env.USE_GITIGNORE, "USE_GITIGNORE")
      : undefined,
    verbose: env.VERBOSE ? parseBooleanFlag(env.VERBOSE, "VERBOSE") : undefined,
    ignoreFilesExtra: splitPatternList(env.IGNORE_FILES_EXTRA),
    ignoreDirsExtra: splitPatternList(env.IGNORE_DIRS_EXTRA),
    ignorePaths: splitPatternList(env.IGNORE_PATHS),
    ignoreAbsolutePaths: splitPatternList(env.IGNORE_ABSOLUTE_PATHS),
  };
}

/**
 * Combine the defaults with caller overrides. Extra patterns are appended
 * to the base lists; scalar overrides replace the defaults.
 */
export function buildScanSettings(
  defaults: ScannerDefaults,
  overrides: SettingsOverrides = {},
): ScanSettings {
  return Object.freeze({
    maxFileSizeBytes: overrides.maxFileSizeBytes ?? defaults.maxFileSizeBytes,
    useGitignore: overrides.useGitignore ?? defaults.useGitignore,
    ignoreFilePatterns: [
      ...splitPatternList(defaults.ignoreFilesBase),
      ...(overrides.ignoreFilesExtra ?? []),
    ],
    ignoreDirPatterns: [
      ...splitPatternList(defaults.ignoreDirsBase),
      ...(overrides.ignoreDirsExtra ?? []),
    ],
    ignorePaths: [...(overrides.ignorePaths ?? [])],
    ignoreAbsolutePaths: [...(overrides.ignoreAbsolutePaths ?? [])],
    codeExtensions: defaults.codeExtensions.map(normalizeExtension),
    wellKnownFiles: [...defaults.wellKnownFiles],
  });
}

/**
 * Apply a project's own config file on top of the run settings. Lists
 * extend, scalars replace.
 */
export function applyProjectConfig(
  settings: ScanSettings,
  file: ProjectConfigFile,
): ScanSettings {
  return Object.freeze({
    maxFileSizeBytes: file.max_file_size ?? settings.maxFileSizeBytes,
    useGitignore: file.use_gitignore ?? settings.useGitignore,
    ignoreFilePatterns: appendUnique(
      settings.ignoreFilePatterns,
      file.ignore_files,
    ),
    ignoreDirPatterns: appendUnique(settings.ignoreDirPatterns, file.ignore_dirs),
    ignorePaths: appendUnique(settings.ignorePaths, file.ignore_paths),
    ignoreAbsolutePaths: [...settings.ignoreAbsolutePaths],
    codeExtensions: appendUnique(
      settings.codeExtensions,
      file.code_extensions?.map(normalizeExtension),
    ),
    wellKnownFiles: appendUnique(settings.wellKnownFiles, file.well_known_files),
  });
}

export function createScanConfig(
  settings: ScanSettings,
  location: ProjectLocation,
): ScanConfig {
  return Object.freeze({
    ...settings,
    projectRoot: location.projectRoot,
    projectName: location.projectName,
    outputPath: location.outputPath,
  });
}

export function normalizeExtension(extension: string): string {
  return extension.startsWith(".") ? extension.slice(1) : extension;
}

function appendUnique(
  base: readonly string[],
  extra: readonly string[] | undefined,
): string[] {
  const merged = [...base];
  for (const value of extra ?? []) {
    if (!merged.includes(value)) {
      merged.push(value);
    }
  }
  return merged;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
