import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { compareCodeUnits } from "../ingest/path-order.js";
import { createPruneRules, type PruneRules } from "../ingest/prune-rules.js";
import { pluralize } from "./report-utils.js";

interface TreeCounts {
  directories: number;
  files: number;
}

/**
 * Render the project layout in the style of `tree`, pruned by the same
 * directory globs as the walker. Every surviving entry is listed, selected
 * or not; directories carry a trailing `/`.
 */
export async function renderTree(
  projectRoot: string,
  ignoreDirPatterns: readonly string[],
): Promise<string[]> {
  const pruneRules = createPruneRules(ignoreDirPatterns);
  const counts: TreeCounts = { directories: 0, files: 0 };
  const lines = ["."];
  await renderDirectory(projectRoot, "", pruneRules, counts, lines);
  lines.push("");
  lines.push(
    `${pluralize(counts.directories, "directory", "directories")}, ${pluralize(counts.files, "file", "files")}`,
  );
  return lines;
}

async function renderDirectory(
  directoryPath: string,
  prefix: string,
  pruneRules: PruneRules,
  counts: TreeCounts,
  lines: string[],
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directoryPath, { withFileTypes: true });
  } catch {
    return;
  }

  const visible = entries
    .filter((entry) =>
      entry.isDirectory()
        ? !pruneRules.isPrunedDirectory(entry.name)
        : !pruneRules.isPrunedFile(entry.name),
    )
    .sort((a, b) => compareCodeUnits(a.name, b.name));

  for (const [index, entry] of visible.entries()) {
    const isLast = index === visible.length - 1;
    const connector = isLast ? "└── " : "├── ";
    if (!entry.isDirectory()) {
      counts.files += 1;
      lines.push(`${prefix}${connector}${entry.name}`);
      continue;
    }

    counts.directories += 1;
    lines.push(`${prefix}${connector}${entry.name}/`);
    await renderDirectory(
      path.join(directoryPath, entry.name),
      prefix + (isLast ? "    " : "│   "),
      pruneRules,
      counts,
      lines,
    );
  }
}
