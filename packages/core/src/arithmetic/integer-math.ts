import { MoneyValueError } from '../errors/index.js';

/**
 * Floor modulo: the remainder takes the sign of the divisor
 * floorMod(-10, 29) === 19, floorMod(10, -29) === -19
 */
export function floorMod(dividend: number, divisor: number): number {
  const remainder = dividend % divisor;
  if (remainder !== 0 && (remainder < 0) !== (divisor < 0)) {
    return remainder + divisor;
  }
  return remainder + 0;
}

/**
 * Floor division: rounds the quotient toward negative infinity
 * floorDiv(-1, 29) === -1
 *
 * Exact for integer operands; falls back to Math.floor for fractional ones.
 */
export function floorDiv(dividend: number, divisor: number): number {
  if (Number.isInteger(dividend) && Number.isInteger(divisor)) {
    return (dividend - floorMod(dividend, divisor)) / divisor + 0;
  }
  return Math.floor(dividend / divisor) + 0;
}

/**
 * Truncate an arithmetic result toward zero and check it still fits a knut count
 */
export function toKnutCount(raw: number, operation: string): number {
  const knuts = Math.trunc(raw) + 0;
  if (!Number.isSafeInteger(knuts)) {
    throw new MoneyValueError(`${operation} produced ${raw}, which is not representable as a knut count`, {
      operation,
      result: raw,
    });
  }
  return knuts;
}
