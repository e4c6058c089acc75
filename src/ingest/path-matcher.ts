export interface PathMatcherOptions {
  readonly ignorePaths: readonly string[];
  readonly ignoreAbsolutePaths: readonly string[];
}

export interface PathMatch {
  readonly scope: "absolute" | "relative";
  readonly pattern: string;
}

export interface PathMatcher {
  matchPath(absolutePath: string, relativePath: string): PathMatch | null;
  isPathIgnored(absolutePath: string, relativePath: string): boolean;
}

export function createPathMatcher(options: PathMatcherOptions): PathMatcher {
  const absolutePrefixes = options.ignoreAbsolutePaths.filter(isNonEmpty);
  const relativeSubstrings = options.ignorePaths.filter(isNonEmpty);

  const matchPath = (
    absolutePath: string,
    relativePath: string,
  ): PathMatch | null => {
    for (const prefix of absolutePrefixes) {
      if (absolutePath.startsWith(prefix)) {
        return { scope: "absolute", pattern: prefix };
      }
    }
    for (const substring of relativeSubstrings) {
      if (relativePath.includes(substring)) {
        return { scope: "relative", pattern: substring };
      }
    }
    return null;
  };

  return {
    matchPath,
    isPathIgnored: (absolutePath, relativePath) =>
      matchPath(absolutePath, relativePath) !== null,
  };
}

function isNonEmpty(value: string): boolean {
  return value.length > 0;
}
