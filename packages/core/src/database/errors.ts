/**
 * Database error classes with adapter-specific context
 */

import { PlanboardError } from '../errors/base.js';

/**
 * Base database error with common context
 */
export abstract class DatabaseError extends PlanboardError {
  constructor(
    message: string,
    public readonly adapter: string,
    operation?: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, `database.${adapter}`, operation, context, options);
  }
}

/**
 * Connection-related errors
 */
export class DatabaseConnectionError extends DatabaseError {
  constructor(
    message: string,
    adapter: string,
    public readonly url?: string,
    options?: ErrorOptions
  ) {
    super(message, adapter, 'connection', { url }, options);
  }
}

/**
 * Migration-related errors
 */
export class DatabaseMigrationError extends DatabaseError {
  constructor(
    message: string,
    adapter: string,
    public readonly migration?: string,
    options?: ErrorOptions
  ) {
    super(message, adapter, 'migration', { migration }, options);
  }
}

/**
 * Query execution errors
 */
export class DatabaseQueryError extends DatabaseError {
  constructor(
    message: string,
    adapter: string,
    operation: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, adapter, operation, context, options);
  }
}

/**
 * URL parsing errors
 */
export class DatabaseUrlError extends DatabaseError {
  constructor(
    message: string,
    public readonly url?: string
  ) {
    super(message, 'url-parser', 'parse', { url });
  }
}

/**
 * Helper function to wrap unknown errors with database context
 */
export function wrapDatabaseError(
  error: unknown,
  adapter: string,
  operation: string,
  context?: Record<string, unknown>
): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new DatabaseQueryError(message, adapter, operation, context, { cause: error });
}
