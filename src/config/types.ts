/**
 * Filter settings shared by every project in one run. Pattern lists are
 * shell-style globs unless noted otherwise.
 */
export interface ScanSettings {
  readonly maxFileSizeBytes: number;
  readonly useGitignore: boolean;
  /** Globs tested against a file's basename. */
  readonly ignoreFilePatterns: readonly string[];
  /** Globs tested against a directory's basename; matches are pruned. */
  readonly ignoreDirPatterns: readonly string[];
  /** Substrings tested against the root-relative path. */
  readonly ignorePaths: readonly string[];
  /** Prefixes tested against the absolute path. */
  readonly ignoreAbsolutePaths: readonly string[];
  /** Extensions without the leading dot. */
  readonly codeExtensions: readonly string[];
  /** Globs for files selected by name, e.g. `Dockerfile` or `README*`. */
  readonly wellKnownFiles: readonly string[];
}

export interface ScanConfig extends ScanSettings {
  readonly projectRoot: string;
  readonly projectName: string;
  readonly outputPath: string;
}

export interface ScannerDefaults {
  readonly maxFileSizeBytes: number;
  readonly useGitignore: boolean;
  readonly ignoreFilesBase: string;
  readonly ignoreDirsBase: string;
  readonly codeExtensions: readonly string[];
  readonly wellKnownFiles: readonly string[];
}

/**
 * Values read from the environment. Every field is optional; absent fields
 * fall back to the defaults file.
 */
export interface EnvSettings {
  readonly targetDir?: string;
  readonly outputDir?: string;
  readonly outputFileSuffix?: string;
  readonly maxFileSizeBytes?: number;
  readonly useGitignore?: boolean;
  readonly verbose?: boolean;
  readonly ignoreFilesExtra: readonly string[];
  readonly ignoreDirsExtra: readonly string[];
  readonly ignorePaths: readonly string[];
  readonly ignoreAbsolutePaths: readonly string[];
}

/** Contents of a `.scanner-config.{yaml,yml,json}` file at a project root. */
export interface ProjectConfigFile {
  readonly code_extensions?: readonly string[];
  readonly well_known_files?: readonly string[];
  readonly ignore_dirs?: readonly string[];
  readonly ignore_files?: readonly string[];
  readonly ignore_paths?: readonly string[];
  readonly max_file_size?: number;
  readonly use_gitignore?: boolean;
}
