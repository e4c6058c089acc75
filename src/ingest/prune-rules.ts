import { compileGlobs, findMatchingGlob } from "./glob-pattern.js";

/** macOS metadata files, pruned from both the walk and the tree. */
const SYSTEM_FILE_PATTERNS = [".DS_Store", "._*"] as const;

export interface PruneRules {
  isPrunedDirectory(name: string): boolean;
  isPrunedFile(name: string): boolean;
}

export function createPruneRules(
  ignoreDirPatterns: readonly string[],
): PruneRules {
  const directoryGlobs = compileGlobs(ignoreDirPatterns);
  const systemGlobs = compileGlobs(SYSTEM_FILE_PATTERNS);
  return {
    isPrunedDirectory: (name) => findMatchingGlob(name, directoryGlobs) !== null,
    isPrunedFile: (name) => findMatchingGlob(name, systemGlobs) !== null,
  };
}
