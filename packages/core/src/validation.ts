import { z } from 'zod';
import { MoneyTypeError, MoneyValueError } from './errors/index.js';

/**
 * Zod schemas for runtime validation
 */

/**
 * A single denomination count: a whole number within the safe integer range
 */
export const DenominationCountSchema = z
  .number()
  .int()
  .min(Number.MIN_SAFE_INTEGER)
  .max(Number.MAX_SAFE_INTEGER);

/**
 * A full { galleons, sickles, knuts } distribution
 */
export const DenominationsSchema = z.object({
  galleons: DenominationCountSchema,
  sickles: DenominationCountSchema,
  knuts: DenominationCountSchema,
});

/**
 * Validate a denomination count
 * Non-numbers are a type error; fractional, non-finite or unsafe numbers a value error.
 * Whole-number floats such as 4.0 are accepted, -0 comes back as 0
 */
export function validateCount(value: unknown, field: string): number {
  if (typeof value !== 'number') {
    throw new MoneyTypeError(`${field} must be a number, got ${typeof value}`, {
      field,
      receivedType: typeof value,
    });
  }

  const result = DenominationCountSchema.safeParse(value);
  if (!result.success) {
    throw new MoneyValueError(`${field} must be an integer or whole number, got ${value}`, {
      field,
      value,
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data + 0;
}

/**
 * Validate a numeric operand (multiplier, divisor, exponent)
 */
export function validateScalar(value: unknown, role: string): number {
  if (typeof value !== 'number') {
    throw new MoneyTypeError(`${role} must be a number, got ${describeType(value)}`, {
      role,
      receivedType: describeType(value),
    });
  }
  if (!Number.isFinite(value)) {
    throw new MoneyValueError(`${role} must be a finite number, got ${value}`, { role, value });
  }
  return value;
}

/**
 * typeof, but tells objects apart by constructor name
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    const name = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === 'string' && name.length > 0 ? name : 'object';
  }
  return typeof value;
}
