/**
 * SQLite database adapter
 */

import { createClient } from '@libsql/client';
import type { Client } from '@libsql/client';
import { drizzle } from 'drizzle-orm/libsql';
import { migrate } from 'drizzle-orm/libsql/migrator';
import { createModuleLogger } from '../../utils/logger.js';
import { DatabaseConnectionError } from '../errors.js';
import { schema } from '../schema.js';
import type { DatabaseBackend, SqlParam, SqlRow, SqliteDrizzle } from './types.js';

const logger = createModuleLogger('SqliteAdapter');

export const MIGRATIONS_TABLE = '__planboard_migrations';

// libSQL (`@libsql/client`) serves both local files (`file:` URLs) and
// in-process databases (`:memory:`). Interactive transactions are avoided:
// the client reopens its connection after one, which would drop an in-memory
// database and the foreign-key pragma with it.
export class SqliteAdapter implements DatabaseBackend<Client> {
  public readonly type = 'sqlite' as const;

  private client: Client | null = null;
  private db: SqliteDrizzle | null = null;

  constructor(
    private readonly config: {
      url: string;
      debug: boolean;
    }
  ) {}

  async init(): Promise<void> {
    try {
      this.client = createClient({ url: this.config.url });
      // Cascade rules are only honoured with foreign keys switched on
      await this.client.execute('PRAGMA foreign_keys = ON');
      this.db = drizzle(this.client, { schema, logger: this.config.debug });
      logger.debug({ url: this.config.url }, 'SQLite connection opened');
    } catch (error) {
      throw new DatabaseConnectionError(
        `Failed to open SQLite database: ${error instanceof Error ? error.message : String(error)}`,
        this.type,
        this.config.url,
        { cause: error }
      );
    }
  }

  get drizzle(): SqliteDrizzle {
    if (!this.db) {
      throw new DatabaseConnectionError('SQLite adapter used before init()', this.type, this.config.url);
    }
    return this.db;
  }

  get rawClient(): Client {
    if (!this.client) {
      throw new DatabaseConnectionError('SQLite adapter used before init()', this.type, this.config.url);
    }
    return this.client;
  }

  async query(sql: string, args: SqlParam[] = []): Promise<SqlRow[]> {
    const result = await this.rawClient.execute({ sql, args });
    return result.rows.map((row) => ({ ...row }));
  }

  async migrate(migrationsFolder: string): Promise<void> {
    await migrate(this.drizzle, { migrationsFolder, migrationsTable: MIGRATIONS_TABLE });
  }

  async close(): Promise<void> {
    this.client?.close();
    this.client = null;
    this.db = null;
  }
}
