/**
 * Migration runner for Planboard databases
 *
 * Delegates to the adapter, which applies the drizzle-kit migrations through
 * drizzle's migrator. The count of applied migrations is read from the
 * migrator's ledger table before and after the run.
 */

import { createModuleLogger, logError, startTimer } from '../utils/logger.js';
import { type DatabaseBackend, MIGRATIONS_TABLE } from './adapters/index.js';
import { DatabaseMigrationError } from './errors.js';

const logger = createModuleLogger('MigrationRunner');

/**
 * Result of migration operation
 */
export interface MigrationResult {
  success: boolean;
  adapterType: string;
  migrationsApplied: number;
  error?: Error;
}

export class MigrationRunner {
  constructor(private readonly migrationsDir: string) {}

  async runMigrations(adapter: DatabaseBackend): Promise<MigrationResult> {
    const finished = startTimer(logger, 'runMigrations');

    try {
      logger.debug({ migrationsDir: this.migrationsDir }, 'Starting migrations');

      const before = await recordedMigrations(adapter);
      await adapter.migrate(this.migrationsDir);
      const migrationsApplied = (await recordedMigrations(adapter)) - before;

      finished({ adapterType: adapter.type, migrationsApplied });

      return { success: true, adapterType: adapter.type, migrationsApplied };
    } catch (error) {
      logError(logger, error, { adapterType: adapter.type, migrationsDir: this.migrationsDir });

      return {
        success: false,
        adapterType: adapter.type,
        migrationsApplied: 0,
        error: new DatabaseMigrationError(
          `Migration failed: ${error instanceof Error ? error.message : String(error)}`,
          adapter.type,
          this.migrationsDir,
          { cause: error }
        ),
      };
    }
  }
}

/**
 * Number of rows in the migrator's ledger, 0 before the first run
 */
export async function recordedMigrations(adapter: DatabaseBackend): Promise<number> {
  const tables = await adapter.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
    [MIGRATIONS_TABLE]
  );
  if (tables.length === 0) {
    return 0;
  }
  const [row] = await adapter.query(`SELECT count(*) AS total FROM ${MIGRATIONS_TABLE}`);
  return Number(row?.total ?? 0);
}

export function createMigrationRunner(migrationsDir: string): MigrationRunner {
  return new MigrationRunner(migrationsDir);
}
