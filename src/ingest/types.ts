export interface FileCandidate {
  readonly absolutePath: string;
  /** Relative to the project root, POSIX separators. */
  readonly relativePath: string;
  readonly name: string;
  readonly sizeBytes: number;
}

export type PrunedKind = "directory" | "file";

export interface WalkOptions {
  readonly ignoreDirPatterns: readonly string[];
  /** Allow-set check applied before a file is yielded. */
  readonly isSelectable: (fileName: string) => boolean;
  /** Told about each pruned directory and system file, in walk order. */
  readonly onPrune?: (
    relativePath: string,
    kind: PrunedKind,
  ) => void | Promise<void>;
}

export type FileContent =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "binary" }
  | { readonly kind: "unreadable"; readonly message: string };

export interface ScanTarget {
  readonly rootPath: string;
  readonly source: "local" | "git";
  readonly repoUrl?: string;
  readonly cleanup?: () => Promise<void>;
}
