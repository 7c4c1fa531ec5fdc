const MS_PER_SECOND = 1000;

/**
 * Normalize a report duration to milliseconds.
 *
 * Numbers are seconds. Strings may carry an `ms` or `s` suffix; a bare
 * numeric string is seconds. Anything unparsable is 0.
 */
export function toMillis(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value * MS_PER_SECOND : 0;
  }
  if (typeof value !== "string") return 0;

  const text = value.trim().toLowerCase();
  if (text.endsWith("ms")) return orZero(parseNumber(text.slice(0, -2)));
  if (text.endsWith("s")) return orZero(parseNumber(text.slice(0, -1))) * MS_PER_SECOND;
  return orZero(parseNumber(text)) * MS_PER_SECOND;
}

/**
 * `H:MM:SS.fraction` to milliseconds. Exactly three colon-separated parts
 * are required; any other shape is 0.
 */
export function clockToMillis(value: string): number {
  const parts = value.trim().split(":");
  if (parts.length !== 3) return 0;
  const [hours, minutes, seconds] = parts.map(parseNumber);
  if ([hours, minutes, seconds].some(Number.isNaN)) return 0;
  return (hours * 3600 + minutes * 60 + seconds) * MS_PER_SECOND;
}

/** Below this, bare TRX numbers are seconds; at or above, already milliseconds. */
export const TRX_BARE_MS_THRESHOLD = 1000;

/**
 * TRX durations: clock strings, bare numeric strings (seconds), or bare
 * numbers read through the threshold heuristic.
 */
export function trxDurationToMillis(value: unknown): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return 0;
    return value < TRX_BARE_MS_THRESHOLD ? value * MS_PER_SECOND : value;
  }
  if (typeof value !== "string") return 0;

  const text = value.trim();
  if (text.split(":").length === 3) return clockToMillis(text);
  const seconds = parseNumber(text);
  return Number.isNaN(seconds) ? 0 : seconds * MS_PER_SECOND;
}

function orZero(n: number): number {
  return Number.isNaN(n) ? 0 : n;
}

function parseNumber(text: string): number {
  const trimmed = text.trim();
  if (trimmed === "" || !/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(trimmed)) return Number.NaN;
  return Number(trimmed);
}
