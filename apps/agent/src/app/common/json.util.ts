/**
 * Safely parse a JSON string, returning `undefined` for null/undefined/empty
 * values, or the provided fallback for malformed JSON.
 */
export function safeParseJson(
  value: string | null | undefined,
  fallback: unknown = {}
): unknown {
  if (value == null || value === '') return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return fallback;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Truncate to `max` characters, appending `...` when anything was cut. */
export function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max)}...`;
}
