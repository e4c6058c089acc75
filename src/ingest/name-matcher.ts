import {
  compileGlobs,
  findMatchingGlob,
  type GlobPattern,
} from "./glob-pattern.js";

/** Always excluded, whatever the configured lists say. */
export const SYSTEM_FILE_NAME = ".DS_Store";

export interface NameMatcherOptions {
  readonly codeExtensions: readonly string[];
  readonly wellKnownFiles: readonly string[];
  readonly ignoreFilePatterns: readonly string[];
}

export interface NameMatcher {
  /** True when the name is in the allow-set by extension or well-known name. */
  isSelectable(fileName: string): boolean;
  /** The ignore pattern that matches the name, or null. */
  findIgnoredFilePattern(fileName: string): string | null;
}

export function createNameMatcher(options: NameMatcherOptions): NameMatcher {
  const extensions = new Set(options.codeExtensions);
  const wellKnown = compileGlobs(options.wellKnownFiles);
  const ignored = compileGlobs(options.ignoreFilePatterns);

  return {
    isSelectable(fileName) {
      if (fileName === SYSTEM_FILE_NAME) {
        return false;
      }
      const extension = extensionOf(fileName);
      if (extension !== null && extensions.has(extension)) {
        return true;
      }
      return findMatchingGlob(fileName, wellKnown) !== null;
    },
    findIgnoredFilePattern(fileName) {
      if (fileName === SYSTEM_FILE_NAME) {
        return SYSTEM_FILE_NAME;
      }
      return findMatchingGlob(fileName, ignored)?.source ?? null;
    },
  };
}

/** Patterns come precompiled; build them once with `compileGlobs`. */
export function findMatchingPattern(
  fileName: string,
  patterns: readonly GlobPattern[],
): string | null {
  return findMatchingGlob(fileName, patterns)?.source ?? null;
}

export function matchesAnyPattern(
  fileName: string,
  patterns: readonly GlobPattern[],
): boolean {
  return findMatchingPattern(fileName, patterns) !== null;
}

/** Text after the last dot, or null when the name has no dot. */
function extensionOf(fileName: string): string | null {
  const dot = fileName.lastIndexOf(".");
  if (dot === -1) {
    return null;
  }
  return fileName.slice(dot + 1);
}
