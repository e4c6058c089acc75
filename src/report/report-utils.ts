const KIB = 1024;
const MIB = 1024 * 1024;

/** Whole binary units: `512B`, `3KB`, `2MB`. */
export function formatBytes(bytes: number): string {
  if (bytes < KIB) {
    return `${bytes}B`;
  }
  if (bytes < MIB) {
    return `${Math.floor(bytes / KIB)}KB`;
  }
  return `${Math.floor(bytes / MIB)}MB`;
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

const LINE_NUMBER_WIDTH = 4;
export const LINE_NUMBER_SEPARATOR = " │ ";
const NUMBERED_LINE = /^ *\d+ │ /;

/**
 * Number every line from 1, blank lines included. Carriage returns are
 * dropped and a final newline does not start an extra line.
 */
export function numberLines(text: string): string[] {
  const normalized = text.replace(/\r/g, "");
  if (!normalized) {
    return [];
  }
  const lines = normalized.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map(
    (line, index) =>
      `${String(index + 1).padStart(LINE_NUMBER_WIDTH)}${LINE_NUMBER_SEPARATOR}${line}`,
  );
}

export function stripLineNumbers(lines: readonly string[]): string {
  return lines.map((line) => line.replace(NUMBERED_LINE, "")).join("\n");
}

export function pluralize(
  count: number,
  singular: string,
  plural: string,
): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
