// This utility module keeps JSON parse operations on untrusted input safe and explicit.

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

// This helper parses one input frame and reports malformed content as a value instead of an exception.
export function tryParseJson(raw: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(raw) as unknown };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'unknown' };
  }
}

// This guard narrows parsed JSON to a plain object, excluding arrays and null.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
