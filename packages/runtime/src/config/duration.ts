import { ConfigError } from "../errors";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const PART = /(\d+)\s*(ms|s|m|h|d)\s*/y;

/** Longest delay setTimeout and setInterval accept; larger values fire after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

function checkRange(ms: number, shown: string, path?: string): number {
  if (ms === 0) throw new ConfigError(`invalid duration ${shown}, must be greater than zero`, path);
  if (ms > MAX_DURATION_MS) {
    throw new ConfigError(`invalid duration ${shown}, must not exceed ${MAX_DURATION_MS}ms`, path);
  }
  return ms;
}

/**
 * Milliseconds from a number of milliseconds or a string such as `15s` or `1m30s`.
 * Zero and anything a timer cannot hold are rejected.
 */
export function parseDuration(value: number | string, path?: string): number {
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`invalid duration ${value}, expected a non-negative integer of milliseconds`, path);
    }
    return checkRange(value, String(value), path);
  }

  const text = value.trim();
  if (/^\d+$/.test(text)) return checkRange(Number(text), `"${value}"`, path);

  let total = 0;
  PART.lastIndex = 0;
  while (PART.lastIndex < text.length) {
    const match = PART.exec(text);
    if (!match) break;
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  if (text.length === 0 || PART.lastIndex !== text.length) {
    throw new ConfigError(`invalid duration "${value}", expected e.g. "500ms", "15s" or "1m30s"`, path);
  }
  return checkRange(total, `"${value}"`, path);
}
