import fs from "node:fs/promises";
import path from "node:path";

/** Append-only destination for report text. */
export interface ReportSink {
  write(chunk: string): Promise<void>;
}

export interface FileReportSink extends ReportSink {
  readonly filePath: string;
  close(): Promise<void>;
}

export interface MemoryReportSink extends ReportSink {
  contents(): string;
}

/**
 * Open (and truncate) a report file. Chunks are written in order at the
 * current position; the caller closes the sink.
 */
export async function openFileSink(filePath: string): Promise<FileReportSink> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const handle = await fs.open(filePath, "w");
  return {
    filePath,
    write: async (chunk) => {
      await handle.appendFile(chunk, "utf8");
    },
    close: async () => {
      await handle.close();
    },
  };
}

export function createMemorySink(): MemoryReportSink {
  const chunks: string[] = [];
  return {
    write: async (chunk) => {
      chunks.push(chunk);
    },
    contents: () => chunks.join(""),
  };
}
