import { inspect } from 'node:util';
import {
  distributeAsGalleons,
  distributeAsKnuts,
  distributeAsSickles,
  floorDiv,
  floorMod,
  toKnutCount,
  totalKnuts,
} from '../arithmetic/index.js';
import { UNIT_SUFFIXES } from '../constants.js';
import { MoneyTypeError, MoneyValueError } from '../errors/index.js';
import type { FormatOptions, ParseOptions } from '../interfaces/index.js';
import { parseQuantity } from '../parser/index.js';
import type { QuantityInput } from '../parser/index.js';
import { DENOMINATIONS } from '../types/index.js';
import type { Denominations } from '../types/index.js';
import { describeType, validateCount, validateScalar } from '../validation.js';

/**
 * Anything accepted where another amount is expected:
 * a MoneyAmount, a knut count, or a quantity string such as "5g, 10k"
 */
export type MoneyOperand = MoneyAmount | QuantityInput;

/**
 * Operand after classification
 */
type Operand =
  | { kind: 'amount'; amount: Denominations }
  | { kind: 'knuts'; knuts: number }
  | { kind: 'quantity'; text: string };

function classifyOperand(value: unknown, operation: string): Operand {
  if (value instanceof MoneyAmount) {
    return { kind: 'amount', amount: value.toJSON() };
  }
  if (typeof value === 'number') {
    return { kind: 'knuts', knuts: value };
  }
  if (typeof value === 'string') {
    return { kind: 'quantity', text: value };
  }
  const receivedType = describeType(value);
  throw new MoneyTypeError(
    `${operation} expects a MoneyAmount, number or quantity string, got ${receivedType}`,
    { operation, receivedType }
  );
}

function resolveOperand(operand: Operand): Denominations {
  switch (operand.kind) {
    case 'amount':
      return operand.amount;
    case 'knuts':
      return parseQuantity(operand.knuts);
    case 'quantity':
      return parseQuantity(operand.text);
  }
}

/**
 * Run every count through toKnutCount so overflowed or -0 results never reach a field
 */
function checked(counts: Denominations, operation: string): Denominations {
  return {
    galleons: toKnutCount(counts.galleons, operation),
    sickles: toKnutCount(counts.sickles, operation),
    knuts: toKnutCount(counts.knuts, operation),
  };
}

/**
 * Throws unless the counts add up to a safe knut count
 */
function withSafeTotal(counts: Denominations, operation: string): Denominations {
  toKnutCount(totalKnuts(counts), operation);
  return counts;
}

function normalizedKnuts(knuts: number): Denominations {
  return distributeAsGalleons({ galleons: 0, sickles: 0, knuts });
}

/**
 * MoneyAmount
 * A mutable amount of wizard money held as three independent, signed counts.
 *
 * Arithmetic that keeps the shape of the amount (add, subtract, negate,
 * integer multiply) works per denomination and does not normalize. Arithmetic
 * on the total (fractional multiply, division, modulo, power) works in knuts
 * and returns the result normalized to the largest denominations.
 *
 * Equality compares total value, so 1 sickle equals 29 knuts.
 *
 * ```typescript
 * const amount = new MoneyAmount(5, 2, 1000);
 * amount.toGalleons().toString();  // "7g, 2s, 14k"
 * amount.value;                    // 3523
 * amount.add('1g, -10k');          // MoneyAmount(galleons=6, sickles=2, knuts=990)
 * ```
 */
export class MoneyAmount implements Denominations, Iterable<string> {
  private _galleons: number;
  private _sickles: number;
  private _knuts: number;

  /**
   * Either three whole-number counts, or a single quantity string
   * (further arguments are then ignored)
   *
   * @throws MoneyTypeError when a count is not a number
   * @throws MoneyValueError when a count is fractional or non-finite, or a count or the total is beyond the safe integer range
   * @throws FormatError when the quantity string is malformed
   */
  constructor(quantity: string);
  constructor(galleons?: number, sickles?: number, knuts?: number);
  constructor(galleons: number | string = 0, sickles: number = 0, knuts: number = 0) {
    const counts = withSafeTotal(
      typeof galleons === 'string'
        ? parseQuantity(galleons)
        : {
            galleons: validateCount(galleons, 'galleons'),
            sickles: validateCount(sickles, 'sickles'),
            knuts: validateCount(knuts, 'knuts'),
          },
      'MoneyAmount'
    );
    this._galleons = counts.galleons;
    this._sickles = counts.sickles;
    this._knuts = counts.knuts;
  }

  /**
   * Parse a quantity string or knut count
   */
  static parse(input: QuantityInput, options?: ParseOptions): MoneyAmount {
    return MoneyAmount.fromDenominations(parseQuantity(input, options));
  }

  /**
   * Build from a { galleons, sickles, knuts } record, validating each count
   */
  static fromDenominations(counts: Denominations): MoneyAmount {
    return new MoneyAmount(counts.galleons, counts.sickles, counts.knuts);
  }

  /**
   * A new, independent amount from any operand; MoneyAmount inputs are copied
   */
  static from(operand: MoneyOperand): MoneyAmount {
    return MoneyAmount.fromDenominations(resolveOperand(classifyOperand(operand, 'from')));
  }

  get galleons(): number {
    return this._galleons;
  }

  set galleons(count: number) {
    this.assign({ ...this.toJSON(), galleons: validateCount(count, 'galleons') }, 'galleons');
  }

  get sickles(): number {
    return this._sickles;
  }

  set sickles(count: number) {
    this.assign({ ...this.toJSON(), sickles: validateCount(count, 'sickles') }, 'sickles');
  }

  get knuts(): number {
    return this._knuts;
  }

  set knuts(count: number) {
    this.assign({ ...this.toJSON(), knuts: validateCount(count, 'knuts') }, 'knuts');
  }

  /**
   * Total worth in knuts. Read-only; recomputed on each access and always a safe integer
   */
  get value(): number {
    return totalKnuts(this);
  }

  resetGalleons(): this {
    return this.assign({ ...this.toJSON(), galleons: 0 }, 'resetGalleons');
  }

  resetSickles(): this {
    return this.assign({ ...this.toJSON(), sickles: 0 }, 'resetSickles');
  }

  resetKnuts(): this {
    return this.assign({ ...this.toJSON(), knuts: 0 }, 'resetKnuts');
  }

  /**
   * Independent copy; hand this to another owner instead of sharing the instance
   */
  clone(): MoneyAmount {
    return new MoneyAmount(this._galleons, this._sickles, this._knuts);
  }

  // Conversions

  toKnuts(): MoneyAmount {
    return MoneyAmount.fromDenominations(checked(distributeAsKnuts(this), 'toKnuts'));
  }

  toSickles(): MoneyAmount {
    return MoneyAmount.fromDenominations(checked(distributeAsSickles(this), 'toSickles'));
  }

  /**
   * Largest denominations possible; sickles end up in [0, 17) and knuts in [0, 29)
   */
  toGalleons(): MoneyAmount {
    return MoneyAmount.fromDenominations(checked(distributeAsGalleons(this), 'toGalleons'));
  }

  normalize(): MoneyAmount {
    return this.toGalleons();
  }

  convertToKnuts(): this {
    return this.assign(checked(distributeAsKnuts(this), 'convertToKnuts'), 'convertToKnuts');
  }

  convertToSickles(): this {
    return this.assign(checked(distributeAsSickles(this), 'convertToSickles'), 'convertToSickles');
  }

  convertToGalleons(): this {
    return this.assign(checked(distributeAsGalleons(this), 'convertToGalleons'), 'convertToGalleons');
  }

  // Arithmetic

  add(other: MoneyOperand): MoneyAmount {
    return MoneyAmount.fromDenominations(this.combine(other, 1, 'add'));
  }

  subtract(other: MoneyOperand): MoneyAmount {
    return MoneyAmount.fromDenominations(this.combine(other, -1, 'subtract'));
  }

  /**
   * other - this
   */
  subtractFrom(other: MoneyOperand): MoneyAmount {
    const difference = this.combine(other, -1, 'subtractFrom');
    return new MoneyAmount(-difference.galleons + 0, -difference.sickles + 0, -difference.knuts + 0);
  }

  negate(): MoneyAmount {
    return new MoneyAmount(-this._galleons + 0, -this._sickles + 0, -this._knuts + 0);
  }

  /**
   * Whole-number factors scale each denomination. Fractional factors scale the
   * total value, truncate to whole knuts and normalize:
   * (1, 25, 35) * 2.35 -> 1253k * 2.35 -> 2944k -> (5, 16, 15)
   */
  multiply(factor: number): MoneyAmount {
    return MoneyAmount.fromDenominations(this.scaled(factor, 'multiply'));
  }

  /**
   * Floor division of the total value, normalized
   */
  floorDivide(divisor: number): MoneyAmount {
    return MoneyAmount.fromDenominations(this.quotient(divisor, 'floorDivide'));
  }

  /**
   * Same as floorDivide; there is no fractional division of money
   */
  divide(divisor: number): MoneyAmount {
    return MoneyAmount.fromDenominations(this.quotient(divisor, 'divide'));
  }

  /**
   * Floor modulo of the total value, normalized; the remainder takes the divisor's sign
   */
  modulo(divisor: number): MoneyAmount {
    return MoneyAmount.fromDenominations(this.remainder(divisor, 'modulo'));
  }

  divmod(divisor: number): [MoneyAmount, MoneyAmount] {
    return [
      MoneyAmount.fromDenominations(this.quotient(divisor, 'divmod')),
      MoneyAmount.fromDenominations(this.remainder(divisor, 'divmod')),
    ];
  }

  /**
   * Total value raised to exponent, truncated to whole knuts and normalized
   */
  power(exponent: number): MoneyAmount {
    return MoneyAmount.fromDenominations(this.raised(exponent, 'power'));
  }

  addInPlace(other: MoneyOperand): this {
    return this.assign(this.combine(other, 1, 'addInPlace'), 'addInPlace');
  }

  subtractInPlace(other: MoneyOperand): this {
    return this.assign(this.combine(other, -1, 'subtractInPlace'), 'subtractInPlace');
  }

  multiplyInPlace(factor: number): this {
    return this.assign(this.scaled(factor, 'multiplyInPlace'), 'multiplyInPlace');
  }

  floorDivideInPlace(divisor: number): this {
    return this.assign(this.quotient(divisor, 'floorDivideInPlace'), 'floorDivideInPlace');
  }

  divideInPlace(divisor: number): this {
    return this.assign(this.quotient(divisor, 'divideInPlace'), 'divideInPlace');
  }

  moduloInPlace(divisor: number): this {
    return this.assign(this.remainder(divisor, 'moduloInPlace'), 'moduloInPlace');
  }

  powerInPlace(exponent: number): this {
    return this.assign(this.raised(exponent, 'powerInPlace'), 'powerInPlace');
  }

  // Comparison and presentation

  /**
   * Value equality. Numbers are compared as exact knut counts, strings are parsed,
   * anything else is unequal
   *
   * @throws FormatError when other is a malformed quantity string
   */
  equals(other: unknown): boolean {
    if (other instanceof MoneyAmount) {
      return other.value === this.value;
    }
    if (typeof other === 'number') {
      return other === this.value;
    }
    if (typeof other === 'string') {
      return totalKnuts(parseQuantity(other)) === this.value;
    }
    return false;
  }

  /**
   * "5g, 2s, 10k" with raw counts, signs included
   */
  toString(): string {
    return this.format();
  }

  format(options: FormatOptions = {}): string {
    const { separator = ', ', omitZero = false } = options;
    const parts = DENOMINATIONS.filter((field) => !omitZero || this[field] !== 0).map(
      (field) => `${this[field]}${UNIT_SUFFIXES[field]}`
    );
    return parts.length > 0 ? parts.join(separator) : `0${UNIT_SUFFIXES.knuts}`;
  }

  /**
   * Constructor-call form, e.g. "MoneyAmount(galleons=5, sickles=2, knuts=10)"
   */
  toDebugString(): string {
    return `${this.constructor.name}(galleons=${this._galleons}, sickles=${this._sickles}, knuts=${this._knuts})`;
  }

  [inspect.custom](): string {
    return this.toDebugString();
  }

  toJSON(): Denominations {
    return { galleons: this._galleons, sickles: this._sickles, knuts: this._knuts };
  }

  /**
   * Yields "{g}g", "{s}s", "{k}k"; every call starts over
   */
  [Symbol.iterator](): Iterator<string> {
    return DENOMINATIONS.map((field) => `${this[field]}${UNIT_SUFFIXES[field]}`).values();
  }

  // Internals: each computes the new counts without touching the receiver; assign checks before it writes

  private assign(counts: Denominations, operation: string): this {
    withSafeTotal(counts, operation);
    this._galleons = counts.galleons;
    this._sickles = counts.sickles;
    this._knuts = counts.knuts;
    return this;
  }

  private combine(other: unknown, sign: 1 | -1, operation: string): Denominations {
    const rhs = resolveOperand(classifyOperand(other, operation));
    return checked(
      {
        galleons: this._galleons + sign * rhs.galleons,
        sickles: this._sickles + sign * rhs.sickles,
        knuts: this._knuts + sign * rhs.knuts,
      },
      operation
    );
  }

  private scaled(factor: unknown, operation: string): Denominations {
    const scalar = validateScalar(factor, 'multiplier');
    if (Number.isInteger(scalar)) {
      return checked(
        {
          galleons: this._galleons * scalar,
          sickles: this._sickles * scalar,
          knuts: this._knuts * scalar,
        },
        operation
      );
    }
    return normalizedKnuts(toKnutCount(this.value * scalar, operation));
  }

  private quotient(divisor: unknown, operation: string): Denominations {
    const scalar = validateDivisor(divisor, operation);
    return normalizedKnuts(toKnutCount(floorDiv(this.value, scalar), operation));
  }

  private remainder(divisor: unknown, operation: string): Denominations {
    const scalar = validateDivisor(divisor, operation);
    return normalizedKnuts(toKnutCount(floorMod(this.value, scalar), operation));
  }

  private raised(exponent: unknown, operation: string): Denominations {
    const scalar = validateScalar(exponent, 'exponent');
    return normalizedKnuts(toKnutCount(this.value ** scalar, operation));
  }
}

function validateDivisor(divisor: unknown, operation: string): number {
  if (divisor instanceof MoneyAmount) {
    throw new MoneyTypeError(`${operation}: cannot divide by a MoneyAmount; divisor must be a number`, {
      operation,
      receivedType: 'MoneyAmount',
    });
  }
  const scalar = validateScalar(divisor, 'divisor');
  if (scalar === 0) {
    throw new MoneyValueError(`${operation}: division by zero`, { operation });
  }
  return scalar;
}
