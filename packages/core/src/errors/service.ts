/**
 * Service-specific error classes
 *
 * Errors raised by the entity services while enforcing the creation, update
 * and deletion contracts.
 */

import type { Violation, ViolationKind } from '../validation/field-validators.js';
import { PlanboardError } from './base.js';

export type EntityName = 'project' | 'board' | 'label' | 'list' | 'task';

/**
 * Base class for service-related errors
 */
export abstract class ServiceError extends PlanboardError {
  constructor(
    message: string,
    service: string,
    operation?: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, `service.${service}`, operation, context, options);
  }
}

/**
 * Raised when a candidate record breaks one or more rules.
 * Lists every violation found, not only the first.
 */
export class ValidationError extends ServiceError {
  constructor(
    public readonly entity: EntityName,
    operation: string,
    public readonly violations: Violation[],
    options?: ErrorOptions
  ) {
    super(
      `Invalid ${entity}: ${violations.map((v) => `${v.field}: ${v.message}`).join('; ')}`,
      entity,
      operation,
      { violations },
      options
    );
  }

  /**
   * Violations grouped by field name
   */
  byField(): Record<string, Violation[]> {
    const grouped: Record<string, Violation[]> = {};
    for (const violation of this.violations) {
      (grouped[violation.field] ??= []).push(violation);
    }
    return grouped;
  }

  hasKind(kind: ViolationKind, field?: string): boolean {
    return this.violations.some(
      (v) => v.kind === kind && (field === undefined || v.field === field)
    );
  }
}

/**
 * Error thrown when an entity is not found
 */
export class EntityNotFoundError extends ServiceError {
  constructor(
    public readonly entity: EntityName,
    public readonly entityId: number | string,
    operation?: string
  ) {
    super(`${capitalize(entity)} ${entityId} not found`, entity, operation, {
      entityId,
    });
  }
}

/**
 * Error thrown when an unknown entity type is requested from the import registry
 */
export class RegistryError extends PlanboardError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'importers.registry', operation, context);
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
