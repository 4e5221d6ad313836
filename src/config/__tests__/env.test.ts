/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, coerceEnvValue, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('loads known variables', () => {
    vi.stubEnv('S3_BUCKET', 'utility-bills');
    vi.stubEnv('QDRANT_PORT', '6334');

    const env = loadEnv();

    expect(env.S3_BUCKET).toBe('utility-bills');
    expect(env.QDRANT_PORT).toBe('6334');
  });

  it('treats blank values as unset', () => {
    vi.stubEnv('LLM_MODEL', '   ');

    expect(getEnv('LLM_MODEL')).toBeUndefined();
  });

  it('caches environment variables after first load', () => {
    vi.stubEnv('TOP_K', '4');
    expect(getEnv('TOP_K')).toBe('4');

    vi.stubEnv('TOP_K', '9');
    expect(getEnv('TOP_K')).toBe('4');

    _clearEnvCache();
    expect(getEnv('TOP_K')).toBe('9');
  });
});

describe('coerceEnvValue', () => {
  it('converts numbers and booleans', () => {
    expect(coerceEnvValue('42', 'number')).toBe(42);
    expect(coerceEnvValue('0.25', 'number')).toBe(0.25);
    expect(coerceEnvValue('yes', 'boolean')).toBe(true);
    expect(coerceEnvValue('0', 'boolean')).toBe(false);
  });

  it('passes unconvertible text through', () => {
    expect(coerceEnvValue('many', 'number')).toBe('many');
    expect(coerceEnvValue('maybe', 'boolean')).toBe('maybe');
    expect(coerceEnvValue('llama3.1', 'string')).toBe('llama3.1');
  });
});
