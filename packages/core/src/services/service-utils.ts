/**
 * Common service utilities and helper functions
 *
 * Shared pieces of the create/update contract: collecting violations from
 * several checks, reading candidate values that may not have parsed, and
 * turning missing rows into not-found errors.
 */

import { type EntityName, EntityNotFoundError, ValidationError } from '../errors/service.js';
import type { Violation } from '../validation/field-validators.js';

/**
 * Accumulates violations from the schema check and the store checks so a
 * single ValidationError can report all of them
 */
export class ViolationCollector {
  private readonly items: Violation[] = [];

  add(...violations: Violation[]): void {
    this.items.push(...violations);
  }

  get violations(): readonly Violation[] {
    return this.items;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  toError(entity: EntityName, operation: string): ValidationError {
    return new ValidationError(entity, operation, [...this.items]);
  }
}

/**
 * Read a string field from an unvalidated record, if it is one
 */
export function readString(input: unknown, key: string): string | undefined {
  const value = readField(input, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read an integer field from an unvalidated record, if it is one
 */
export function readInteger(input: unknown, key: string): number | undefined {
  const value = readField(input, key);
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

function readField(input: unknown, key: string): unknown {
  if (input === null || typeof input !== 'object') {
    return undefined;
  }
  return Reflect.get(input, key);
}

/**
 * Validates that a row was found and returns it
 *
 * @throws EntityNotFoundError if the row is missing
 */
export function requireEntity<T>(
  entity: EntityName,
  id: number | string,
  row: T | null,
  operation?: string
): T {
  if (row === null) {
    throw new EntityNotFoundError(entity, id, operation);
  }
  return row;
}

/**
 * Whether an update record sets anything at all
 */
export function hasChanges(updates: object): boolean {
  return Object.values(updates).some((value) => value !== undefined);
}

export function missingParent(field: string, parent: string, id: number): Violation {
  return {
    field,
    kind: 'ReferentialError',
    message: `${parent} ${id} does not exist.`,
    value: id,
  };
}

export function duplicate(field: string, message: string, value: unknown): Violation {
  return { field, kind: 'UniquenessError', message, value };
}

/**
 * Read an array of integers from an unvalidated record, dropping anything
 * that is not one
 */
export function readIntegers(input: unknown, key: string): number[] | undefined {
  const value = readField(input, key);
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is number => typeof item === 'number' && Number.isInteger(item));
}
