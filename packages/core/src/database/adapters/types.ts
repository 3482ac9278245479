/**
 * Shared types and interfaces for database adapters
 */

import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import type { PlanboardSchema } from '../schema.js';

export type SqliteDrizzle = LibSQLDatabase<PlanboardSchema>;

/**
 * SQL query parameters - can be various primitive types
 */
export type SqlParam = string | number | bigint | boolean | null;

/**
 * Result row from SQL query - record with unknown values
 */
export type SqlRow = Record<string, unknown>;

/**
 * Common interface for database backends
 */
export interface DatabaseBackend<TRawClient = unknown> {
  /** Native Drizzle ORM instance */
  readonly drizzle: SqliteDrizzle;

  /** Raw client for escape hatch operations */
  readonly rawClient: TRawClient;

  /** Backend type for logging/debugging */
  readonly type: 'sqlite';

  /** Initialize the backend connection */
  init(): Promise<void>;

  /** Run one parameterised statement and return its rows */
  query(sql: string, args?: SqlParam[]): Promise<SqlRow[]>;

  /** Apply the drizzle-kit migrations found in a folder */
  migrate(migrationsFolder: string): Promise<void>;

  /** Close the database connection */
  close(): Promise<void>;
}
