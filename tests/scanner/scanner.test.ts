import path from "node:path";
import { describe, expect, it } from "vitest";
import type { ScanSettings } from "../../src/config/types.js";
import { DEFAULT_MAX_FILE_SIZE_BYTES } from "../../src/ingest/size-probe.js";
import type { FileCandidate } from "../../src/ingest/types.js";
import {
  emptyStats,
  foldDecision,
  foldPruned,
  mergeStats,
  recordReadError,
} from "../../src/scanner/run-stats.js";
import {
  createSelectionPipeline,
  decide,
  describeDecision,
} from "../../src/scanner/selection-pipeline.js";
import type { Decision } from "../../src/scanner/types.js";

const settings: ScanSettings = {
  maxFileSizeBytes: 100,
  useGitignore: true,
  ignoreFilePatterns: ["*.log", "*.key"],
  ignoreDirPatterns: [],
  ignorePaths: ["fixtures/"],
  ignoreAbsolutePaths: ["/opt/secret"],
  codeExtensions: ["ts", "log", "key"],
  wellKnownFiles: [],
};

function candidate(
  relativePath: string,
  sizeBytes: number,
  absolutePath = `/work/proj/${relativePath}`,
): FileCandidate {
  return {
    absolutePath,
    relativePath,
    name: path.posix.basename(relativePath),
    sizeBytes,
  };
}

describe("selection pipeline", () => {
  const pipeline = createSelectionPipeline(settings, []);

  it("includes files that pass every rule", () => {
    expect(pipeline.decide(candidate("src/a.ts", 50))).toEqual({
      kind: "include",
      sizeBytes: 50,
    });
  });

  it("checks gitignore before file name patterns", () => {
    const withGitignore = createSelectionPipeline(settings, ["*.log"]);

    expect(withGitignore.decide(candidate("app.log", 5))).toEqual({
      kind: "skip-gitignore",
      pattern: "*.log",
    });
    expect(pipeline.decide(candidate("app.log", 5))).toEqual({
      kind: "skip-file-pattern",
      pattern: "*.log",
    });
  });

  it("always skips .DS_Store by name", () => {
    expect(pipeline.decide(candidate("src/.DS_Store", 5))).toEqual({
      kind: "skip-file-pattern",
      pattern: ".DS_Store",
    });
  });

  it("checks file names before paths", () => {
    expect(pipeline.decide(candidate("fixtures/x.key", 5))).toEqual({
      kind: "skip-file-pattern",
      pattern: "*.key",
    });
    expect(pipeline.decide(candidate("test/fixtures/a.ts", 5))).toEqual({
      kind: "skip-path-pattern",
      scope: "relative",
      pattern: "fixtures/",
    });
    expect(
      pipeline.decide(candidate("a.ts", 5, "/opt/secret/a.ts")),
    ).toEqual({
      kind: "skip-path-pattern",
      scope: "absolute",
      pattern: "/opt/secret",
    });
  });

  it("checks size last", () => {
    expect(pipeline.decide(candidate("big.ts", 101))).toEqual({
      kind: "skip-too-large",
      sizeBytes: 101,
      maxBytes: 100,
    });
    expect(pipeline.decide(candidate("edge.ts", 100))).toEqual({
      kind: "include",
      sizeBytes: 100,
    });
    expect(pipeline.decide(candidate("fixtures/big.ts", 5000)).kind).toBe(
      "skip-path-pattern",
    );
    expect(
      createSelectionPipeline(settings, ["big"]).decide(
        candidate("big.ts", 5000),
      ).kind,
    ).toBe("skip-gitignore");
  });

  it("allows exactly the default maximum", () => {
    const defaults = { ...settings, maxFileSizeBytes: DEFAULT_MAX_FILE_SIZE_BYTES };

    expect(decide(candidate("exact.ts", 2097152), defaults, [])).toEqual({
      kind: "include",
      sizeBytes: 2097152,
    });
    expect(decide(candidate("over.ts", 2097153), defaults, [])).toEqual({
      kind: "skip-too-large",
      sizeBytes: 2097153,
      maxBytes: 2097152,
    });
  });

  it("is deterministic for the same input", () => {
    const input = candidate("src/a.ts", 10);

    expect(decide(input, settings, ["*.md"])).toEqual(
      decide(input, settings, ["*.md"]),
    );
  });

  it("describes decisions for logging", () => {
    expect(describeDecision({ kind: "include", sizeBytes: 1 })).toBe("included");
    expect(describeDecision({ kind: "skip-gitignore", pattern: "*.log" })).toBe(
      "gitignore pattern: *.log",
    );
    expect(
      describeDecision({ kind: "skip-file-pattern", pattern: "*.key" }),
    ).toBe("matches ignore pattern: *.key");
    expect(
      describeDecision({
        kind: "skip-path-pattern",
        scope: "relative",
        pattern: "fixtures/",
      }),
    ).toBe("relative path match: fixtures/");
    expect(
      describeDecision({ kind: "skip-too-large", sizeBytes: 101, maxBytes: 100 }),
    ).toBe("too large: 101 > 100 bytes");
  });
});

describe("run stats", () => {
  it("folds decisions into counters", () => {
    const decisions: Decision[] = [
      { kind: "include", sizeBytes: 500 },
      { kind: "include", sizeBytes: 24 },
      { kind: "skip-gitignore", pattern: "*.log" },
      { kind: "skip-file-pattern", pattern: "*.key" },
      { kind: "skip-too-large", sizeBytes: 101, maxBytes: 100 },
    ];

    const stats = recordReadError(
      foldPruned(decisions.reduce(foldDecision, emptyStats())),
    );

    expect(stats).toEqual({
      filesProcessed: 2,
      filesSkipped: 4,
      gitignoreSkipped: 1,
      prunedEntries: 1,
      totalBytes: 524,
      readErrors: 1,
    });
  });

  it("merges per-project totals", () => {
    const a = foldDecision(emptyStats(), { kind: "include", sizeBytes: 10 });
    const b = foldDecision(emptyStats(), {
      kind: "skip-gitignore",
      pattern: "dist",
    });

    expect(mergeStats(a, b)).toEqual({
      filesProcessed: 1,
      filesSkipped: 1,
      gitignoreSkipped: 1,
      prunedEntries: 0,
      totalBytes: 10,
      readErrors: 0,
    });
  });
});
