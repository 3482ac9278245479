/**
 * Database adapters and types
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { type DbUrl, isFileBasedUrl, toClientUrl } from '../url-parser.js';
import { SqliteAdapter } from './sqlite.js';

export type { DatabaseBackend, SqlParam, SqlRow, SqliteDrizzle } from './types.js';
export { MIGRATIONS_TABLE, SqliteAdapter } from './sqlite.js';

export interface AdapterOptions {
  debug: boolean;
}

/**
 * Create the backend for a parsed database URL, making sure the parent
 * directory of a database file exists first
 */
export function createAdapter(parsed: DbUrl, options: AdapterOptions): SqliteAdapter {
  if (isFileBasedUrl(parsed)) {
    mkdirSync(dirname(parsed.file), { recursive: true });
  }
  return new SqliteAdapter({ url: toClientUrl(parsed), debug: options.debug });
}
