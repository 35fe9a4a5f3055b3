import { describe, it, expect } from 'vitest';
import { parseNonNegativeInt } from '../lib/config/env.js';
import { ValidationError } from '../lib/errors.js';

describe('parseNonNegativeInt', () => {
  it('returns the fallback when the value is unset or empty', () => {
    expect(parseNonNegativeInt('SEED_ORGS', undefined, 10)).toBe(10);
    expect(parseNonNegativeInt('SEED_ORGS', '', 10)).toBe(10);
  });

  it('parses a digit string', () => {
    expect(parseNonNegativeInt('SEED_ORGS', '25', 10)).toBe(25);
    expect(parseNonNegativeInt('SEED_ORGS', '0', 10)).toBe(0);
  });

  it('rejects a non-numeric seed count instead of seeding nothing', () => {
    expect(() => parseNonNegativeInt('SEED_ORGS', 'ten', 10)).toThrow(ValidationError);
    expect(() => parseNonNegativeInt('SEED_ORGS', 'ten', 10)).toThrow(
      "SEED_ORGS must be a non-negative integer, got 'ten'",
    );
  });

  it('rejects negative and fractional values', () => {
    expect(() => parseNonNegativeInt('SEED_ORGS', '-1', 10)).toThrow(ValidationError);
    expect(() => parseNonNegativeInt('SEED_ORGS', '2.5', 10)).toThrow(ValidationError);
  });
});
