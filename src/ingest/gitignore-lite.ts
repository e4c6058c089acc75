import fs from "node:fs/promises";
import path from "node:path";
import { createGlobPattern, type GlobPattern } from "./glob-pattern.js";

export const GITIGNORE_FILE_NAME = ".gitignore";

/**
 * A loose reading of `.gitignore`: a pattern matches when it
 * appears anywhere in the relative path, or when it matches the basename as
 * a glob. Negation (`!`), anchoring (`/`), directory-only suffixes and `**`
 * are not interpreted; such lines are matched as literal text.
 */
export interface GitignorePatternSet {
  readonly patterns: readonly string[];
  findMatch(relativePath: string, baseName: string): string | null;
}

/**
 * Lines starting with `#` are comments; the rest are trimmed and blank
 * ones dropped, so `  #tmp` is the pattern `#tmp`.
 */
export function parseGitignore(contents: string): string[] {
  const patterns: string[] = [];
  for (const rawLine of contents.split(/\r?\n/)) {
    if (rawLine.startsWith("#")) {
      continue;
    }
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    patterns.push(line);
  }
  return patterns;
}

export async function loadGitignorePatterns(
  projectRoot: string,
  enabled: boolean,
): Promise<string[]> {
  if (!enabled) {
    return [];
  }

  let contents: string;
  try {
    contents = await fs.readFile(
      path.join(projectRoot, GITIGNORE_FILE_NAME),
      "utf8",
    );
  } catch {
    // Missing, a directory or unreadable: the project has no patterns.
    return [];
  }
  return parseGitignore(contents);
}

export function createGitignorePatternSet(
  patterns: readonly string[],
): GitignorePatternSet {
  const compiled: Array<{ raw: string; glob: GlobPattern }> = patterns.map(
    (raw) => ({ raw, glob: createGlobPattern(raw) }),
  );

  return {
    patterns,
    findMatch(relativePath, baseName) {
      for (const { raw, glob } of compiled) {
        if (relativePath.includes(raw) || glob.matches(baseName)) {
          return raw;
        }
      }
      return null;
    },
  };
}

export function findGitignoreMatch(
  relativePath: string,
  baseName: string,
  patterns: readonly string[],
): string | null {
  return createGitignorePatternSet(patterns).findMatch(relativePath, baseName);
}

export function isIgnored(
  relativePath: string,
  baseName: string,
  patterns: readonly string[],
): boolean {
  return findGitignoreMatch(relativePath, baseName, patterns) !== null;
}
