/**
 * Validation module
 *
 * Field-level primitives plus the glue that turns zod issues into the flat
 * violation lists services report.
 */

export * from './field-validators.js';
export * from './schema-validation.js';
