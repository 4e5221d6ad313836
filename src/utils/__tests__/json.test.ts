/**
 * Tests for JSON parsing of tool arguments
 */

import { describe, it, expect } from 'vitest';
import { parseJson, normalizeToolArguments } from '../json.js';

describe('parseJson', () => {
  it('parses valid JSON object', () => {
    expect(parseJson('{"query":"march bill","top_k":3}')).toEqual({
      ok: true,
      value: { query: 'march bill', top_k: 3 },
    });
  });

  it('parses JSON primitives', () => {
    expect(parseJson('123')).toEqual({ ok: true, value: 123 });
    expect(parseJson('null')).toEqual({ ok: true, value: null });
  });

  it('returns the parser message for malformed JSON', () => {
    const result = parseJson('{"query": ');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.length).toBeGreaterThan(0);
    }
  });
});

describe('normalizeToolArguments', () => {
  it('passes objects through unchanged', () => {
    const args = { query: 'gas usage' };
    expect(normalizeToolArguments(args)).toEqual({ ok: true, value: args });
  });

  it('parses string arguments', () => {
    expect(normalizeToolArguments('{"query":"gas usage"}')).toEqual({
      ok: true,
      value: { query: 'gas usage' },
    });
  });

  it('treats empty string and undefined as an empty object', () => {
    expect(normalizeToolArguments('  ')).toEqual({ ok: true, value: {} });
    expect(normalizeToolArguments(undefined)).toEqual({ ok: true, value: {} });
  });

  it('reports unparseable strings', () => {
    expect(normalizeToolArguments('query=gas').ok).toBe(false);
  });
});
