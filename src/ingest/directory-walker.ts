import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { compareCodeUnits } from "./path-order.js";
import { createPruneRules, type PruneRules } from "./prune-rules.js";
import { probeSize } from "./size-probe.js";
import type { FileCandidate, WalkOptions } from "./types.js";

const SKIPPABLE_DIRECTORY_ERRORS = new Set([
  "EACCES",
  "EPERM",
  "ENOENT",
  "ENOTDIR",
]);

/**
 * Lazily yield the selectable files under `projectRoot` in lexicographic
 * order of their relative path. Ignored directories are never entered and
 * symbolic links are not followed. Every call starts a fresh traversal.
 */
export async function* walkProject(
  projectRoot: string,
  options: WalkOptions,
): AsyncGenerator<FileCandidate> {
  const realRoot = await fs.realpath(projectRoot);
  const pruneRules = createPruneRules(options.ignoreDirPatterns);
  const rootEntries = await fs.readdir(realRoot, { withFileTypes: true });
  yield* walkEntries(realRoot, "", rootEntries, pruneRules, options);
}

async function* walkEntries(
  currentPath: string,
  relativeDir: string,
  dirEntries: readonly Dirent[],
  pruneRules: PruneRules,
  options: WalkOptions,
): AsyncGenerator<FileCandidate> {
  for (const dirent of sortForPathOrder(dirEntries)) {
    const absolutePath = path.join(currentPath, dirent.name);
    const relativePath = relativeDir
      ? `${relativeDir}/${dirent.name}`
      : dirent.name;

    if (dirent.isDirectory()) {
      if (pruneRules.isPrunedDirectory(dirent.name)) {
        await options.onPrune?.(relativePath, "directory");
        continue;
      }
      const children = await readDirectory(absolutePath);
      if (children) {
        yield* walkEntries(
          absolutePath,
          relativePath,
          children,
          pruneRules,
          options,
        );
      }
      continue;
    }

    if (!dirent.isFile()) {
      continue;
    }
    if (pruneRules.isPrunedFile(dirent.name)) {
      await options.onPrune?.(relativePath, "file");
      continue;
    }
    if (!options.isSelectable(dirent.name)) {
      continue;
    }

    yield {
      absolutePath,
      relativePath,
      name: dirent.name,
      sizeBytes: await probeSize(absolutePath),
    };
  }
}

/**
 * Directories sort as `name/`, which places `a.ts` before `a/` and `a-b/`
 * before `a/` exactly as a sort over full paths would.
 */
function sortForPathOrder(entries: readonly Dirent[]): Dirent[] {
  const sortKey = (entry: Dirent): string =>
    entry.isDirectory() ? `${entry.name}/` : entry.name;
  return [...entries].sort((a, b) => compareCodeUnits(sortKey(a), sortKey(b)));
}

async function readDirectory(directoryPath: string): Promise<Dirent[] | null> {
  try {
    return await fs.readdir(directoryPath, { withFileTypes: true });
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      typeof error.code === "string" &&
      SKIPPABLE_DIRECTORY_ERRORS.has(error.code)
    ) {
      return null;
    }
    throw error;
  }
}
