/**
 * FormatError
 * Thrown when a quantity string cannot be parsed
 * e.g. "5x", "1.5g", "5g,,2s"
 */
export class FormatError extends Error {
  /**
   * The comma-delimited piece that was rejected, trimmed
   */
  readonly quantity: string;

  constructor(
    message: string,
    quantity: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, FormatError.prototype);
    this.name = "FormatError";
    this.quantity = quantity;
  }
}

/**
 * MoneyTypeError
 * Thrown when an argument or operand has an unsupported type,
 * such as dividing by a MoneyAmount or multiplying by a string
 */
export class MoneyTypeError extends TypeError {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, MoneyTypeError.prototype);
    this.name = "MoneyTypeError";
  }
}

/**
 * MoneyValueError
 * Thrown when a number has the right type but cannot be used:
 * fractional or unsafe denomination counts, non-finite scalars,
 * zero divisors and results too large to hold as a knut count
 */
export class MoneyValueError extends RangeError {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, MoneyValueError.prototype);
    this.name = "MoneyValueError";
  }
}

export type MoneyError = FormatError | MoneyTypeError | MoneyValueError;

export function isMoneyError(error: unknown): error is MoneyError {
  return (
    error instanceof FormatError ||
    error instanceof MoneyTypeError ||
    error instanceof MoneyValueError
  );
}
