import { z } from 'zod';
import { type FieldValidator, fail } from '../validation/field-validators.js';
import { refineWith } from '../validation/schema-validation.js';

// Database identifiers are auto-incrementing integers starting at 1
export const entityId = z.number().int().positive();

/**
 * Required, non-blank string with an upper length bound
 */
export function requiredText(maxLength: number) {
  return z
    .string()
    .min(1, 'This field cannot be blank.')
    .max(maxLength, `Ensure this value has at most ${maxLength} characters.`);
}

/**
 * Optional string with an upper length bound; blank is allowed
 */
export function optionalText(maxLength: number) {
  return z.string().max(maxLength, `Ensure this value has at most ${maxLength} characters.`);
}

// Letters, digits, underscores and hyphens
export const slugPattern = /^[-a-zA-Z0-9_]+$/;

/**
 * Blank passes so the required-check can report it on its own
 */
export const slugFormat: FieldValidator<string> = (value) =>
  value === '' || slugPattern.test(value)
    ? { valid: true }
    : fail(
        'FormatError',
        'Enter a valid “slug” consisting of letters, numbers, underscores or hyphens.',
        value
      );

export function slugField(maxLength: number) {
  return optionalText(maxLength).superRefine(refineWith(slugFormat));
}
