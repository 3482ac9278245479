/**
 * Centralized error handling for Planboard
 */

export {
  PlanboardError,
  wrapError,
  isPlanboardError,
  extractErrorDetails,
} from './base.js';

export {
  ServiceError,
  ValidationError,
  EntityNotFoundError,
  RegistryError,
  type EntityName,
} from './service.js';

// Re-export database errors for convenience
export {
  DatabaseError,
  DatabaseConnectionError,
  DatabaseMigrationError,
  DatabaseQueryError,
  DatabaseUrlError,
  wrapDatabaseError,
} from '../database/errors.js';
