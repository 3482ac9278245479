/**
 * Field validation primitives
 *
 * Standalone rules applied to scalar field values. Each rule is pure and
 * returns an outcome instead of throwing, so several rules can be chained on
 * one field and every failure reported together.
 */

/**
 * Kinds of rule a field or entity can violate
 */
export type ViolationKind =
  | 'FormatError'
  | 'RangeError'
  | 'DivisibilityError'
  | 'UniquenessError'
  | 'ReferentialError'
  | 'LengthError'
  | 'RequiredError'
  | 'ChoiceError'
  | 'TypeError';

export interface Violation {
  field: string;
  kind: ViolationKind;
  message: string;
  value?: unknown;
}

/** A failed rule before it is attached to a field */
export type RuleFailure = Omit<Violation, 'field'>;

export type ValidationOutcome = { valid: true } | { valid: false; failure: RuleFailure };

export type FieldValidator<T> = (value: T) => ValidationOutcome;

const PASS: ValidationOutcome = { valid: true };

export const HEX_COLOR_PATTERN = /^#[A-Fa-f0-9]{6}$/;

export function fail(kind: ViolationKind, message: string, value: unknown): ValidationOutcome {
  return { valid: false, failure: { kind, message, value } };
}

/**
 * `#` followed by exactly six hex digits, either case. No shorthand, no alpha.
 */
export function validateHexColor(value: string): ValidationOutcome {
  if (HEX_COLOR_PATTERN.test(value)) {
    return PASS;
  }
  return fail('FormatError', 'Color must be a valid hex code (e.g., #AABBCC).', value);
}

/**
 * Inclusive on both ends.
 */
export function validateRange(value: number, min: number, max: number): ValidationOutcome {
  if (value >= min && value <= max) {
    return PASS;
  }
  return fail('RangeError', `Ensure this value is between ${min} and ${max} (got ${value}).`, value);
}

export function validateDivisibleBy(value: number, divisor: number): ValidationOutcome {
  if (value % divisor === 0) {
    return PASS;
  }
  return fail('DivisibilityError', `${value} is not divisible by ${divisor}.`, value);
}

// Curried forms for building validator chains

export function hexColor(): FieldValidator<string> {
  return validateHexColor;
}

export function inRange(min: number, max: number): FieldValidator<number> {
  return (value) => validateRange(value, min, max);
}

export function divisibleBy(divisor: number): FieldValidator<number> {
  return (value) => validateDivisibleBy(value, divisor);
}

/**
 * Run every validator in the chain against one field value.
 * All failures are returned, in chain order.
 */
export function runValidators<T>(
  field: string,
  value: T,
  validators: readonly FieldValidator<T>[]
): Violation[] {
  const violations: Violation[] = [];
  for (const validator of validators) {
    const outcome = validator(value);
    if (!outcome.valid) {
      violations.push({ field, ...outcome.failure });
    }
  }
  return violations;
}
