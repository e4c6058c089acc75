import fs from "node:fs/promises";

export const DEFAULT_MAX_FILE_SIZE_BYTES = 2 * 1024 * 1024;

/** Size in bytes, or 0 when the file cannot be stat'ed. */
export async function probeSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch {
    return 0;
  }
}

export function isOversized(sizeBytes: number, maxBytes: number): boolean {
  return sizeBytes > maxBytes;
}
