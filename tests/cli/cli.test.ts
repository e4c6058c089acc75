import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, type Logger } from "../../src/cli/logger.js";
import {
  discoverProjects,
  runScanCommand,
} from "../../src/cli/scan-command.js";

const NOW = new Date(2026, 0, 2, 3, 4, 5);

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-snapshot-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

interface RecordingLogger extends Logger {
  readonly infos: string[];
  readonly verboses: string[];
  readonly errors: string[];
}

function recordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const verboses: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    verboses,
    errors,
    info: async (message) => {
      infos.push(message);
    },
    verbose: async (message) => {
      verboses.push(message);
    },
    error: async (message) => {
      errors.push(message);
    },
  };
}

async function writeProjects(inputDir: string): Promise<void> {
  await writeText(path.join(inputDir, "api", "package.json"), "{}\n");
  await writeText(path.join(inputDir, "api", "src", "index.ts"), "export {};\n");
  await writeText(path.join(inputDir, "web", "index.html"), "<html></html>\n");
  await writeText(
    path.join(inputDir, "web", "node_modules", "x.js"),
    "module.exports = 1;\n",
  );
}

describe("scan command", () => {
  it("writes one report per project folder", async () => {
    const inputDir = path.join(tempDir, "input");
    const outDir = path.join(tempDir, "output");
    await writeProjects(inputDir);
    const logger = recordingLogger();

    const result = await runScanCommand(
      { target: inputDir, outDir, now: NOW },
      logger,
    );

    expect(result.projects.map((project) => project.name)).toEqual([
      "api",
      "web",
    ]);
    expect(result.projects.map((project) => project.outputPath)).toEqual([
      path.join(outDir, "api_snapshot.txt"),
      path.join(outDir, "web_snapshot.txt"),
    ]);
    expect(result.failed).toBe(0);
    expect(result.totals).toEqual({
      filesProcessed: 3,
      filesSkipped: 1,
      gitignoreSkipped: 0,
      prunedEntries: 1,
      totalBytes: 28,
      readErrors: 0,
    });

    const apiReport = await fs.readFile(
      path.join(outDir, "api_snapshot.txt"),
      "utf8",
    );
    expect(apiReport).toContain("║ PROJECT: api\n║ Type: Node.js\n");
    expect(apiReport).toContain("│ ./src/index.ts\n│ Size: 11B\n");
    expect(logger.infos).toContain("[2/2] web");
    expect(logger.verboses).toEqual(["Pruned directory node_modules"]);
    expect(logger.errors).toEqual([]);
  });

  it("scans the target itself with single", async () => {
    const inputDir = path.join(tempDir, "input");
    const outDir = path.join(tempDir, "output");
    await writeProjects(inputDir);

    const result = await runScanCommand(
      {
        target: inputDir,
        outDir,
        suffix: ".txt",
        single: true,
        now: NOW,
      },
      recordingLogger(),
    );

    expect(result.projects).toHaveLength(1);
    expect(result.projects[0]?.outputPath).toBe(path.join(outDir, "input.txt"));
    expect(result.totals.filesProcessed).toBe(3);
  });

  it("falls back to a single project without subdirectories", async () => {
    const inputDir = path.join(tempDir, "flat");
    await writeText(path.join(inputDir, "main.go"), "package main\n");
    const logger = recordingLogger();

    const result = await runScanCommand(
      { target: inputDir, outDir: path.join(tempDir, "output"), now: NOW },
      logger,
    );

    expect(result.projects.map((project) => project.name)).toEqual(["flat"]);
    expect(logger.infos).toContain(
      "No subdirectories found; scanning the target as a single project.",
    );
  });

  it("applies overrides and skips files over the limit", async () => {
    const inputDir = path.join(tempDir, "input");
    await writeText(path.join(inputDir, "app", "big.ts"), "x".repeat(20));
    await writeText(path.join(inputDir, "app", "small.ts"), "x".repeat(10));
    const logger = recordingLogger();

    const result = await runScanCommand(
      {
        target: inputDir,
        outDir: path.join(tempDir, "output"),
        overrides: { maxFileSizeBytes: 10 },
        now: NOW,
      },
      logger,
    );

    expect(result.totals.filesProcessed).toBe(1);
    expect(result.totals.filesSkipped).toBe(1);
    expect(logger.verboses).toEqual([
      "Skipping big.ts (too large: 20 > 10 bytes)",
    ]);
  });

  it("records a failing project and continues with the rest", async () => {
    const inputDir = path.join(tempDir, "input");
    await writeProjects(inputDir);
    await writeText(
      path.join(inputDir, "bad", ".scanner-config.yaml"),
      "max_size: 1\n",
    );
    const logger = recordingLogger();

    const result = await runScanCommand(
      { target: inputDir, outDir: path.join(tempDir, "output"), now: NOW },
      logger,
    );

    const configPath = path.join(inputDir, "bad", ".scanner-config.yaml");
    expect(result.failed).toBe(1);
    expect(result.projects.map((project) => project.error)).toEqual([
      undefined,
      `Invalid project config ${configPath}: config.max_size is not allowed`,
      undefined,
    ]);
    expect(logger.errors).toEqual([
      `Failed to scan bad: Invalid project config ${configPath}: config.max_size is not allowed`,
    ]);
    expect(result.totals.filesProcessed).toBe(3);
  });

  it("rejects a missing target", async () => {
    const missing = path.join(tempDir, "missing");

    await expect(
      runScanCommand({ target: missing }, recordingLogger()),
    ).rejects.toThrow(`Target path does not exist: ${missing}`);
  });
});

describe("project discovery", () => {
  it("keeps every visible folder except the output folder", async () => {
    const inputDir = path.join(tempDir, "input");
    await fs.mkdir(path.join(inputDir, "vendor"), { recursive: true });
    await fs.mkdir(path.join(inputDir, "api"));
    await fs.mkdir(path.join(inputDir, "build"));
    await fs.mkdir(path.join(inputDir, ".git"));
    await fs.mkdir(path.join(inputDir, "snapshots"));
    await writeText(path.join(inputDir, "notes.md"), "# notes\n");

    const projects = await discoverProjects(
      inputDir,
      path.join(inputDir, "snapshots"),
    );

    expect(projects).toEqual([
      { name: "api", rootPath: path.join(inputDir, "api") },
      { name: "build", rootPath: path.join(inputDir, "build") },
      { name: "vendor", rootPath: path.join(inputDir, "vendor") },
    ]);
  });

  it("scans project folders whose names are ignore globs", async () => {
    const inputDir = path.join(tempDir, "input");
    await writeText(path.join(inputDir, "build", "main.ts"), "export {};\n");
    await writeText(path.join(inputDir, "vendor", "lib.go"), "package lib\n");

    const result = await runScanCommand(
      { target: inputDir, outDir: path.join(tempDir, "output"), now: NOW },
      recordingLogger(),
    );

    expect(result.projects.map((project) => project.name)).toEqual([
      "build",
      "vendor",
    ]);
    expect(result.totals.filesProcessed).toBe(2);
  });
});

describe("logger", () => {
  it("routes messages by level", async () => {
    const stdout = collectingStream();
    const stderr = collectingStream();
    const logger = createLogger({
      verbose: true,
      stdout: stdout.stream,
      stderr: stderr.stream,
    });

    await logger.info("scanning");
    await logger.verbose("Skipping a.log");
    await logger.error("failed");

    expect(stdout.text()).toBe("scanning\n");
    expect(stderr.text()).toBe("  [verbose] Skipping a.log\nfailed\n");
  });

  it("keeps errors when quiet", async () => {
    const stdout = collectingStream();
    const stderr = collectingStream();
    const logger = createLogger({
      verbose: true,
      quiet: true,
      stdout: stdout.stream,
      stderr: stderr.stream,
    });

    await logger.info("scanning");
    await logger.verbose("detail");
    await logger.error("failed");

    expect(stdout.text()).toBe("");
    expect(stderr.text()).toBe("failed\n");
  });
});

function collectingStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

async function writeText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
}
