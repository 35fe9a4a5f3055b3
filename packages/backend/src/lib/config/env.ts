import { ValidationError } from '../errors.js';

/**
 * Read a non-negative integer environment value. Empty or unset gives the
 * fallback; anything else that is not all digits is rejected.
 */
export function parseNonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${name} must be a non-negative integer, got '${raw}'`, { variable: name });
  }
  return parseInt(raw, 10);
}
