/**
 * Database initialization and factory functions
 *
 * Parses the database URL, opens the SQLite backend, applies pending
 * migrations and hands back a ready Store.
 */

import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { createAdapter } from './adapters/index.js';
import { createMigrationRunner } from './migrate.js';
import { DatabaseStore, type Store } from './store.js';
import { parseDbUrl } from './url-parser.js';

const logger = createModuleLogger('database');

const __dirname = dirname(fileURLToPath(import.meta.url));
export const MIGRATIONS_DIR = resolve(__dirname, '..', '..', 'migrations');

export interface DatabaseOptions {
  /** Database file path, sqlite:// URL or memory://label */
  dataDir?: string;
  /** Log every SQL statement */
  verbose?: boolean;
  /** Custom migrations directory (defaults to built-in migrations) */
  migrationsDir?: string;
}

/**
 * Create a database connection and run migrations
 */
export async function createDatabase(options: DatabaseOptions = {}): Promise<Store> {
  const dataDir = options.dataDir ?? cfg.DATABASE_URI;
  const verbose = options.verbose ?? cfg.DB_VERBOSE;

  const parsed = parseDbUrl(dataDir);
  const backend = createAdapter(parsed, { debug: verbose });
  await backend.init();

  const result = await createMigrationRunner(options.migrationsDir ?? MIGRATIONS_DIR).runMigrations(
    backend
  );
  if (!result.success) {
    await backend.close();
    throw result.error ?? new Error('Migration failed');
  }

  logger.debug(
    { backend: backend.type, kind: parsed.kind, migrationsApplied: result.migrationsApplied },
    'Database created successfully'
  );

  return new DatabaseStore(backend);
}

/**
 * Create a throwaway in-process database
 */
export async function createInMemoryDatabase(label = 'default'): Promise<Store> {
  return createDatabase({ dataDir: `memory://${label}`, verbose: false });
}

export { DatabaseStore, constraintViolation, type Store } from './store.js';
export type { NewBoard, NewLabel, NewList, NewProject, NewTask, TaskUpdates } from './store.js';
export { parseDbUrl, type DbUrl } from './url-parser.js';
export {
  MigrationRunner,
  createMigrationRunner,
  recordedMigrations,
  type MigrationResult,
} from './migrate.js';
export * from './schema.js';
