/**
 * Shell-style wildcard pattern. `*` matches any run of characters, slashes
 * included, `?` matches a single character and everything else is literal.
 * Matching is anchored and case-sensitive.
 */
export interface GlobPattern {
  readonly source: string;
  matches(value: string): boolean;
}

export function createGlobPattern(source: string): GlobPattern {
  const regex = new RegExp(`^${globToRegexSource(source)}$`, "s");
  return {
    source,
    matches: (value: string): boolean => regex.test(value),
  };
}

export function compileGlobs(sources: readonly string[]): GlobPattern[] {
  return sources.map(createGlobPattern);
}

export function findMatchingGlob(
  value: string,
  patterns: readonly GlobPattern[],
): GlobPattern | null {
  for (const pattern of patterns) {
    if (pattern.matches(value)) {
      return pattern;
    }
  }
  return null;
}

function globToRegexSource(pattern: string): string {
  let regex = "";
  for (const char of pattern) {
    if (char === "*") {
      regex += ".*";
      continue;
    }

    if (char === "?") {
      regex += ".";
      continue;
    }

    regex += escapeRegex(char);
  }
  return regex;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
