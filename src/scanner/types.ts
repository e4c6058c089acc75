import type { FileCandidate, PrunedKind } from "../ingest/types.js";

export type Decision =
  | { readonly kind: "include"; readonly sizeBytes: number }
  | { readonly kind: "skip-gitignore"; readonly pattern: string }
  | { readonly kind: "skip-file-pattern"; readonly pattern: string }
  | {
      readonly kind: "skip-path-pattern";
      readonly scope: "absolute" | "relative";
      readonly pattern: string;
    }
  | {
      readonly kind: "skip-too-large";
      readonly sizeBytes: number;
      readonly maxBytes: number;
    };

export type DecisionKind = Decision["kind"];

export type SkipDecision = Exclude<Decision, { kind: "include" }>;

export interface RunStats {
  readonly filesProcessed: number;
  /** Every skip decision plus every pruned entry. */
  readonly filesSkipped: number;
  readonly gitignoreSkipped: number;
  readonly prunedEntries: number;
  readonly totalBytes: number;
  readonly readErrors: number;
}

export type DecisionObserver = (
  candidate: FileCandidate,
  decision: Decision,
) => void | Promise<void>;

export type PruneObserver = (
  relativePath: string,
  kind: PrunedKind,
) => void | Promise<void>;
