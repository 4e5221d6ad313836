/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.billrag/
 * ├── config.toml     (User configuration)
 * └── index.db        (SQLite index, when vector_store.provider = "sqlite")
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const BILLRAG_DIR = join(homedir(), '.billrag');
export const DEFAULT_CONFIG_PATH = join(BILLRAG_DIR, 'config.toml');
export const DEFAULT_SQLITE_PATH = join(BILLRAG_DIR, 'index.db');

/**
 * Expand a leading ~ and make the path absolute.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return resolve(path);
}
