import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import type { ScanTarget } from "./types.js";

/**
 * Resolve a scan target. Local paths must be existing directories; git URLs
 * are shallow-cloned into a temporary directory the caller removes with
 * `cleanup`.
 */
export async function loadTarget(target: string): Promise<ScanTarget> {
  if (isGitUrl(target)) {
    return await loadFromGit(target);
  }

  const resolvedPath = path.resolve(target);
  await assertDirectory(resolvedPath);
  return {
    rootPath: resolvedPath,
    source: "local",
  };
}

export async function assertDirectory(resolvedPath: string): Promise<void> {
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedPath);
  } catch {
    throw new Error(
      `Target path does not exist: ${resolvedPath}. Provide a valid directory.`,
    );
  }

  if (!stats.isDirectory()) {
    throw new Error(
      `Target path must be a directory: ${resolvedPath}. Provide a directory to scan.`,
    );
  }
}

export function isGitUrl(target: string): boolean {
  if (target.startsWith("git@")) {
    return true;
  }

  try {
    const url = new URL(target);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

/** `https://host/org/tool.git` and `git@host:org/tool.git` both give `tool`. */
export function repoNameFromUrl(repoUrl: string): string {
  const trimmed = repoUrl.replace(/\/+$/, "");
  const lastSegment = trimmed.split(/[/:]/).pop() ?? "";
  const name = lastSegment.replace(/\.git$/, "");
  return name || "repository";
}

async function loadFromGit(repoUrl: string): Promise<ScanTarget> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-snapshot-"));
  const clonePath = path.join(tempDir, repoNameFromUrl(repoUrl));
  const cleanup = async (): Promise<void> => {
    await fs.rm(tempDir, { recursive: true, force: true });
  };

  try {
    await simpleGit().clone(repoUrl, clonePath, ["--depth", "1"]);
  } catch (error) {
    await cleanup();
    throw error;
  }

  return {
    rootPath: clonePath,
    source: "git",
    repoUrl,
    cleanup,
  };
}
