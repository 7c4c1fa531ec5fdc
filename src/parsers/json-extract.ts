/**
 * Locate the first `{` in `text` and the `}` that balances it. Braces
 * inside JSON string literals do not count toward depth.
 *
 * Returns the substring, or null when no balanced object exists.
 */
export function findBalancedObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First balanced JSON object in noisy output, parsed; null when there is none. */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const candidate = findBalancedObject(text);
  if (candidate === null) return null;
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
