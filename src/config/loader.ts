/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Resolve the config file (BILLRAG_CONFIG or ~/.billrag/config.toml)
 * 2. Load config.toml if it exists
 * 3. Validate it with the partial schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides (env values override the file)
 * 6. Validate the result, including the cross-field rules
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { DEFAULT_CONFIG_PATH, expandHome } from './paths.js';
import { ENV_OVERRIDES, coerceEnvValue, loadEnv, type EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Explicit config file (default: BILLRAG_CONFIG, then ~/.billrag/config.toml) */
  configPath?: string;
  /** Environment to apply (default: process.env via loadEnv) */
  env?: EnvVars;
  /** Write the commented template on first run (default: false) */
  createIfMissing?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Undefined source values leave the target untouched.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a dot-notation key on a plain object, creating sections as needed.
 */
function setPath(target: PlainObject, key: string, value: unknown): void {
  const parts = key.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Config file in effect for this process.
 */
export function resolveConfigPath(env: EnvVars = loadEnv()): string {
  return env.BILLRAG_CONFIG ? expandHome(env.BILLRAG_CONFIG) : DEFAULT_CONFIG_PATH;
}

/**
 * Read and validate the TOML file. Returns an empty object when it is absent.
 */
function readConfigFile(configPath: string, createIfMissing: boolean): PlainObject {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: PlainObject;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validation = PartialConfigSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(validation.error.issues)}`
    );
  }
  return parsed;
}

/**
 * Environment overrides as a sparse config object.
 */
export function envOverrides(env: EnvVars): PlainObject {
  const overrides: PlainObject = {};
  for (const { env: name, key, kind } of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined) {
      setPath(overrides, key, coerceEnvValue(value, kind));
    }
  }
  return overrides;
}

/**
 * Load the effective configuration: defaults, then config.toml, then env.
 *
 * @throws ConfigError if the file or the merged result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? loadEnv();
  const configPath = options.configPath ?? resolveConfigPath(env);

  const fromFile = readConfigFile(configPath, options.createIfMissing ?? false);
  const merged = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fromFile), envOverrides(env));

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Get a value by dot-notation path
 * Example: getConfigValue(config, 'chunking.chunk_size') => 1000
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

const SECRET_KEYS = new Set(['access_key', 'secret_key', 'api_key']);

/**
 * List all config values in a flat format, secrets masked
 * Returns entries like ['chunking.chunk_size', 1000]
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else if (SECRET_KEYS.has(key) && value !== undefined) {
        entries.push([fullKey, '********']);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
