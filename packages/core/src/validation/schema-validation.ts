/**
 * Bridges zod schemas and field validator chains into flat violation lists.
 */

import { z } from 'zod';
import type { FieldValidator, Violation, ViolationKind } from './field-validators.js';

const VIOLATION_KINDS: ReadonlySet<string> = new Set<ViolationKind>([
  'FormatError',
  'RangeError',
  'DivisibilityError',
  'UniquenessError',
  'ReferentialError',
  'LengthError',
  'RequiredError',
  'ChoiceError',
  'TypeError',
]);

function isViolationKind(value: unknown): value is ViolationKind {
  return typeof value === 'string' && VIOLATION_KINDS.has(value);
}

/**
 * Turn a validator chain into a zod refinement. Every failing validator adds
 * its own issue, tagged with the violation kind.
 */
export function refineWith<T>(...validators: FieldValidator<T>[]) {
  return (value: T, ctx: z.RefinementCtx): void => {
    for (const validator of validators) {
      const outcome = validator(value);
      if (!outcome.valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: outcome.failure.message,
          params: { kind: outcome.failure.kind },
        });
      }
    }
  };
}

function kindForIssue(issue: z.ZodIssue): ViolationKind {
  switch (issue.code) {
    case z.ZodIssueCode.custom: {
      const kind: unknown = issue.params?.kind;
      return isViolationKind(kind) ? kind : 'FormatError';
    }
    case z.ZodIssueCode.invalid_type:
      return issue.received === 'undefined' || issue.received === 'null'
        ? 'RequiredError'
        : 'TypeError';
    case z.ZodIssueCode.too_big:
      return issue.type === 'string' ? 'LengthError' : 'RangeError';
    case z.ZodIssueCode.too_small:
      return issue.type === 'string' ? 'RequiredError' : 'RangeError';
    case z.ZodIssueCode.invalid_enum_value:
      return 'ChoiceError';
    default:
      return 'FormatError';
  }
}

function getNestedValue(obj: unknown, path: (string | number)[]): unknown {
  return path.reduce<unknown>((current, key) => {
    if (current !== null && typeof current === 'object' && key in current) {
      return Reflect.get(current, key);
    }
    return undefined;
  }, obj);
}

export function issuesToViolations(issues: z.ZodIssue[], data: unknown): Violation[] {
  return issues.map((issue) => ({
    field: issue.path.join('.'),
    kind: kindForIssue(issue),
    message: issue.message,
    value: issue.path.length > 0 ? getNestedValue(data, issue.path) : data,
  }));
}

export type SchemaCheck<T> =
  | { success: true; data: T; violations: [] }
  | { success: false; violations: Violation[] };

/**
 * Parse data with a schema, collecting every issue as a violation
 */
export function checkSchema<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): SchemaCheck<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data, violations: [] };
  }
  return { success: false, violations: issuesToViolations(result.error.issues, data) };
}
