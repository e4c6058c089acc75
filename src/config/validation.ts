export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${label}.${key} is not allowed`);
    }
  }
}

export function parseStringList(
  input: unknown,
  label: string,
  errors: string[],
): string[] | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!Array.isArray(input)) {
    errors.push(`${label} must be an array of strings`);
    return undefined;
  }
  const values: string[] = [];
  input.forEach((item: unknown, index) => {
    if (typeof item !== "string" || item.trim().length === 0) {
      errors.push(`${label}[${index}] must be a non-empty string`);
      return;
    }
    values.push(item.trim());
  });
  return values;
}

export function parseSizeValue(
  input: unknown,
  label: string,
  errors: string[],
): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "number" || !Number.isInteger(input) || input < 0) {
    errors.push(`${label} must be a non-negative integer`);
    return undefined;
  }
  return input;
}

export function parseBooleanValue(
  input: unknown,
  label: string,
  errors: string[],
): boolean | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "boolean") {
    errors.push(`${label} must be a boolean`);
    return undefined;
  }
  return input;
}

/**
 * Split a pipe-delimited pattern string. Entries are trimmed and empty
 * entries dropped, so `"a| b ||"` yields `["a", "b"]`.
 */
export function splitPatternList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split("|")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseByteCount(value: string, source: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(
      `${source} must be a whole number of bytes, received "${value}".`,
    );
  }
  return Number(trimmed);
}

export function parseBooleanFlag(value: string, source: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new Error(`${source} must be true or false, received "${value}".`);
}
