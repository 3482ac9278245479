/**
 * Database URL parsing with standard URL API and essential cases
 */

import { fileURLToPath } from 'node:url';
import { DatabaseUrlError } from './errors.js';

export type DbUrl =
  | { kind: 'sqlite-file'; file: string } // ./data/app.db or sqlite://./data/app.db
  | { kind: 'sqlite-mem'; label: string }; // memory://foo

const SQLITE_PREFIX = 'sqlite://';

/**
 * Parse a database connection string into a typed representation
 */
export function parseDbUrl(raw: string): DbUrl {
  if (!raw) {
    throw new DatabaseUrlError('Database URL cannot be empty', raw);
  }

  // sqlite:// takes the rest verbatim so relative paths survive
  if (raw.startsWith(SQLITE_PREFIX)) {
    const file = raw.slice(SQLITE_PREFIX.length);
    if (!file) {
      throw new DatabaseUrlError(
        'SQLite URL must specify a file path: sqlite://path/to/file.db',
        raw
      );
    }
    return { kind: 'sqlite-file', file };
  }

  let parsedUrl: URL | null = null;
  try {
    parsedUrl = new URL(raw);
  } catch {
    // Not a URL: treat as a plain file path below
  }

  if (!parsedUrl) {
    return { kind: 'sqlite-file', file: raw };
  }

  switch (parsedUrl.protocol) {
    case 'memory:':
      return { kind: 'sqlite-mem', label: parseMemoryLabel(parsedUrl) };
    case 'file:':
      return { kind: 'sqlite-file', file: fileURLToPath(parsedUrl) };
    default:
      throw new DatabaseUrlError(`Unsupported database URL protocol: ${parsedUrl.protocol}`, raw);
  }
}

function parseMemoryLabel(url: URL): string {
  return url.hostname || url.pathname.replace(/^\/+/, '') || 'default';
}

/**
 * The URL handed to the libSQL client
 */
export function toClientUrl(parsed: DbUrl): string {
  switch (parsed.kind) {
    case 'sqlite-file':
      return `file:${parsed.file}`;
    case 'sqlite-mem':
      return ':memory:';
  }
}

export function isFileBasedUrl(parsed: DbUrl): parsed is Extract<DbUrl, { kind: 'sqlite-file' }> {
  return parsed.kind === 'sqlite-file';
}
