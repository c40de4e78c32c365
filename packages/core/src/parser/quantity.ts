/**
 * Quantity string parser
 *
 * A quantity string is a comma-delimited list of signed whole numbers, each
 * followed directly by a lowercase unit: g (galleons), s (sickles) or k (knuts).
 * A bare number counts as knuts. Repeated units are summed:
 *
 *   "5g, 2s, 10k"  -> (5, 2, 10)
 *   "3g, 3g, -5g"  -> (1, 0, 0)
 *   "5g, 10"       -> (5, 0, 10)
 *
 * Numbers are read as knut counts, truncated toward zero.
 */

import { FormatError, MoneyTypeError, MoneyValueError } from '../errors/index.js';
import type { ParseOptions } from '../interfaces/index.js';
import type { Denomination, Denominations } from '../types/index.js';
import { errorToLog, serializeForLog } from '../utils/index.js';
import { describeType, validateCount } from '../validation.js';

export type QuantityInput = string | number;

const QUANTITY_PATTERN = /^(-?\d+)([gsk]?)$/;
const UNKNOWN_UNIT_PATTERN = /^-?\d+(\D+)$/;

/**
 * Parse a quantity string or knut count into denomination counts
 *
 * @throws FormatError for malformed quantity strings
 * @throws MoneyTypeError when input is neither a string nor a number
 * @throws MoneyValueError for NaN, infinities and counts beyond the safe integer range
 */
export function parseQuantity(input: QuantityInput, options: ParseOptions = {}): Denominations {
  const { logger } = options;

  let counts: Denominations;
  try {
    if (typeof input === 'string') {
      counts = parseQuantityString(input);
    } else if (typeof input === 'number') {
      counts = parseKnutCount(input);
    } else {
      throw unsupportedInput(input);
    }
  } catch (error) {
    logger?.warn('Rejected quantity', {
      input: serializeForLog(input),
      error: errorToLog(error),
    });
    throw error;
  }

  logger?.debug('Parsed quantity', { input, ...counts });
  return counts;
}

function parseKnutCount(input: number): Denominations {
  if (!Number.isFinite(input)) {
    throw new MoneyValueError(`Knut count must be a finite number, got ${input}`, { input });
  }
  return { galleons: 0, sickles: 0, knuts: validateCount(Math.trunc(input), 'knuts') };
}

function parseQuantityString(input: string): Denominations {
  const totals: Denominations = { galleons: 0, sickles: 0, knuts: 0 };

  for (const rawPiece of input.split(',')) {
    const piece = rawPiece.trim();
    const match = QUANTITY_PATTERN.exec(piece);
    if (!match) {
      throw new FormatError(describeRejection(piece, input), piece, { input });
    }

    const magnitude = Number(match[1]);
    const field = fieldForSuffix(match[2]);
    const total = totals[field] + magnitude;
    if (!Number.isSafeInteger(magnitude) || !Number.isSafeInteger(total)) {
      throw new FormatError(`Quantity '${piece}' is outside the safe integer range`, piece, {
        input,
        field,
      });
    }
    totals[field] = total;
  }

  return totals;
}

function fieldForSuffix(suffix: string): Denomination {
  switch (suffix) {
    case 'g':
      return 'galleons';
    case 's':
      return 'sickles';
    default:
      return 'knuts';
  }
}

function describeRejection(piece: string, input: string): string {
  if (piece === '') {
    return `Empty quantity in '${input}'`;
  }

  const unknownUnit = UNKNOWN_UNIT_PATTERN.exec(piece);
  if (unknownUnit) {
    return `Quantity '${piece}' has unknown unit '${unknownUnit[1]}'; use 'g', 's', 'k' or no unit`;
  }

  return `Quantity '${piece}' must be a whole number followed by 'g', 's', 'k' or no unit`;
}

function unsupportedInput(input: never): MoneyTypeError {
  const receivedType = describeType(input);
  return new MoneyTypeError(`Quantity must be a string or number, got ${receivedType}`, {
    receivedType,
  });
}
