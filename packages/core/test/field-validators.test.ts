import { describe, expect, it } from 'vitest';
import {
  divisibleBy,
  hexColor,
  inRange,
  runValidators,
  validateDivisibleBy,
  validateHexColor,
  validateRange,
} from '../src/validation/field-validators.js';

describe('validateHexColor', () => {
  it('accepts six hex digits in either case', () => {
    expect(validateHexColor('#AABBCC')).toEqual({ valid: true });
    expect(validateHexColor('#a1b2c3')).toEqual({ valid: true });
  });

  it.each(['#abc', 'AABBCC', '#GGGGGG', '#AABBCCDD', ''])('rejects %j', (value) => {
    expect(validateHexColor(value)).toEqual({
      valid: false,
      failure: {
        kind: 'FormatError',
        message: 'Color must be a valid hex code (e.g., #AABBCC).',
        value,
      },
    });
  });
});

describe('validateRange', () => {
  it('is inclusive at both ends', () => {
    expect(validateRange(0, 0, 100)).toEqual({ valid: true });
    expect(validateRange(100, 0, 100)).toEqual({ valid: true });
  });

  it('reports the bounds and the value', () => {
    expect(validateRange(101, 0, 100)).toEqual({
      valid: false,
      failure: {
        kind: 'RangeError',
        message: 'Ensure this value is between 0 and 100 (got 101).',
        value: 101,
      },
    });
    expect(validateRange(-1, 0, 100).valid).toBe(false);
  });
});

describe('validateDivisibleBy', () => {
  it('accepts multiples including zero', () => {
    expect(validateDivisibleBy(15, 5)).toEqual({ valid: true });
    expect(validateDivisibleBy(0, 5)).toEqual({ valid: true });
  });

  it('names the offending value', () => {
    expect(validateDivisibleBy(7, 5)).toEqual({
      valid: false,
      failure: { kind: 'DivisibilityError', message: '7 is not divisible by 5.', value: 7 },
    });
  });
});

describe('runValidators', () => {
  const storyPointRules = [inRange(0, 100), divisibleBy(5)];

  it('reports every failing rule in chain order', () => {
    expect(runValidators('storyPoints', 103, storyPointRules)).toEqual([
      {
        field: 'storyPoints',
        kind: 'RangeError',
        message: 'Ensure this value is between 0 and 100 (got 103).',
        value: 103,
      },
      {
        field: 'storyPoints',
        kind: 'DivisibilityError',
        message: '103 is not divisible by 5.',
        value: 103,
      },
    ]);
  });

  it('reports only the rule that fails', () => {
    expect(runValidators('storyPoints', 7, storyPointRules).map((v) => v.kind)).toEqual([
      'DivisibilityError',
    ]);
    expect(runValidators('storyPoints', 40, storyPointRules)).toEqual([]);
  });

  it('works with the curried color rule', () => {
    expect(runValidators('color', '#123456', [hexColor()])).toEqual([]);
    expect(runValidators('color', 'red', [hexColor()])).toHaveLength(1);
  });
});
