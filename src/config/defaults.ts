import fs from "node:fs/promises";
import yaml from "js-yaml";
import { resolveDefaultsFile } from "./runtime-paths.js";
import type { ScannerDefaults } from "./types.js";
import {
  isRecord,
  parseBooleanValue,
  parseSizeValue,
  parseStringList,
} from "./validation.js";

export async function loadScannerDefaults(
  defaultsFile?: string,
): Promise<ScannerDefaults> {
  const filePath = await resolveDefaultsFile(defaultsFile);
  const raw = await fs.readFile(filePath, "utf8");
  return parseScannerDefaults(yaml.load(raw), filePath);
}

export function parseScannerDefaults(
  doc: unknown,
  source: string,
): ScannerDefaults {
  if (!isRecord(doc)) {
    throw new Error(`Invalid scanner defaults format: ${source}`);
  }

  const errors: string[] = [];
  const maxFileSizeBytes = parseSizeValue(
    doc.max_file_size,
    "max_file_size",
    errors,
  );
  const useGitignore = parseBooleanValue(
    doc.use_gitignore,
    "use_gitignore",
    errors,
  );
  const codeExtensions = parseStringList(
    doc.code_extensions,
    "code_extensions",
    errors,
  );
  const wellKnownFiles = parseStringList(
    doc.well_known_files,
    "well_known_files",
    errors,
  );
  const ignoreFilesBase = doc.ignore_files_base;
  const ignoreDirsBase = doc.ignore_dirs_base;
  if (typeof ignoreFilesBase !== "string") {
    errors.push("ignore_files_base must be a pipe-delimited string");
  }
  if (typeof ignoreDirsBase !== "string") {
    errors.push("ignore_dirs_base must be a pipe-delimited string");
  }

  if (
    errors.length > 0 ||
    maxFileSizeBytes === undefined ||
    useGitignore === undefined ||
    codeExtensions === undefined ||
    wellKnownFiles === undefined ||
    typeof ignoreFilesBase !== "string" ||
    typeof ignoreDirsBase !== "string"
  ) {
    const details = errors.length > 0 ? errors.join("; ") : "missing fields";
    throw new Error(`Invalid scanner defaults in ${source}: ${details}`);
  }

  return {
    maxFileSizeBytes,
    useGitignore,
    ignoreFilesBase,
    ignoreDirsBase,
    codeExtensions,
    wellKnownFiles,
  };
}
