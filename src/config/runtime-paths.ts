import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const DEFAULTS_FILE_NAME = "scanner-defaults.yaml";

export async function resolveDefaultsFile(
  customDefaultsFile?: string,
): Promise<string> {
  if (customDefaultsFile) {
    return path.resolve(customDefaultsFile);
  }

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledFile = path.resolve(
    moduleDir,
    "..",
    "..",
    "defaults",
    DEFAULTS_FILE_NAME,
  );
  if (await existsFile(bundledFile)) {
    return bundledFile;
  }

  const cwdFile = path.resolve(process.cwd(), "defaults", DEFAULTS_FILE_NAME);
  if (await existsFile(cwdFile)) {
    return cwdFile;
  }

  throw new Error(
    `Unable to find built-in ${DEFAULTS_FILE_NAME}. Reinstall the package or run from its root directory.`,
  );
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
