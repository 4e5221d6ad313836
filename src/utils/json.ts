/**
 * JSON Utilities
 *
 * Tool-call arguments come back from the model either as an object or as a
 * JSON string, depending on the provider. Parsing never throws; callers get
 * a result they must check.
 */

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

/**
 * Parse a JSON string into an unknown value.
 *
 * @example
 * ```typescript
 * const parsed = parseJson('{"query":"march bill"}');
 * if (parsed.ok) schema.safeParse(parsed.value);
 * ```
 */
export function parseJson(json: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(json);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Accept tool arguments in either form. Strings are parsed as JSON; an empty
 * string is treated as an empty object; anything else passes through as is.
 */
export function normalizeToolArguments(raw: unknown): JsonParseResult {
  if (typeof raw !== 'string') {
    return { ok: true, value: raw ?? {} };
  }
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }
  return parseJson(raw);
}
