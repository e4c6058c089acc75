import fs from "node:fs/promises";
import { isBinaryFile } from "isbinaryfile";
import type { FileContent } from "./types.js";

/**
 * Read a selected file whole. Content that looks binary or is not valid
 * UTF-8 is reported as binary; read failures are reported, not thrown.
 */
export async function readFileContent(filePath: string): Promise<FileContent> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    return {
      kind: "unreadable",
      message: error instanceof Error ? error.message : String(error),
    };
  }

  if (buffer.length === 0) {
    return { kind: "text", text: "" };
  }
  if (await isBinaryFile(buffer, buffer.length)) {
    return { kind: "binary" };
  }

  const text = decodeUtf8(buffer);
  return text === null ? { kind: "binary" } : { kind: "text", text };
}

function decodeUtf8(buffer: Buffer): string | null {
  try {
    const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
    return decoder.decode(buffer);
  } catch {
    return null;
  }
}
