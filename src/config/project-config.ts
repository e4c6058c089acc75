import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { ProjectConfigFile } from "./types.js";
import {
  assertNoExtraKeys,
  isRecord,
  parseBooleanValue,
  parseSizeValue,
  parseStringList,
} from "./validation.js";

export const PROJECT_CONFIG_FILE_NAMES = [
  ".scanner-config.yaml",
  ".scanner-config.yml",
  ".scanner-config.json",
] as const;

const PROJECT_CONFIG_KEYS = new Set([
  "code_extensions",
  "well_known_files",
  "ignore_dirs",
  "ignore_files",
  "ignore_paths",
  "max_file_size",
  "use_gitignore",
]);

export interface LoadedProjectConfig {
  readonly filePath: string;
  readonly config: ProjectConfigFile;
}

/**
 * Load the first project config file found at the root. YAML is a superset
 * of JSON, so one parser covers all three names.
 */
export async function loadProjectConfig(
  projectRoot: string,
): Promise<LoadedProjectConfig | null> {
  for (const fileName of PROJECT_CONFIG_FILE_NAMES) {
    const filePath = path.join(projectRoot, fileName);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid project config ${filePath}: ${message}`);
    }
    return { filePath, config: validateProjectConfig(doc, filePath) };
  }
  return null;
}

export function validateProjectConfig(
  input: unknown,
  source: string,
): ProjectConfigFile {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new Error(`Invalid project config ${source}: must be an object`);
  }

  const errors: string[] = [];
  assertNoExtraKeys(input, PROJECT_CONFIG_KEYS, "config", errors);
  const config: ProjectConfigFile = {
    code_extensions: parseStringList(
      input.code_extensions,
      "code_extensions",
      errors,
    ),
    well_known_files: parseStringList(
      input.well_known_files,
      "well_known_files",
      errors,
    ),
    ignore_dirs: parseStringList(input.ignore_dirs, "ignore_dirs", errors),
    ignore_files: parseStringList(input.ignore_files, "ignore_files", errors),
    ignore_paths: parseStringList(input.ignore_paths, "ignore_paths", errors),
    max_file_size: parseSizeValue(input.max_file_size, "max_file_size", errors),
    use_gitignore: parseBooleanValue(
      input.use_gitignore,
      "use_gitignore",
      errors,
    ),
  };

  if (errors.length > 0) {
    throw new Error(`Invalid project config ${source}: ${errors.join("; ")}`);
  }
  return config;
}
