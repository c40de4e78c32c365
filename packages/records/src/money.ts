/**
 * Plain-record money helpers
 * Every function takes and returns { galleons, sickles, knuts } objects and
 * never mutates its arguments.
 *
 * ```typescript
 * const mine = createMoney(2, 10, 5);
 * const yours = createMoney(0, 0, 25);
 *
 * addMoney(mine, yours);      // { galleons: 2, sickles: 10, knuts: 30 }
 * multiplyMoney(mine, 2);     // { galleons: 4, sickles: 20, knuts: 10 }
 * convertToKnuts(mine);       // { galleons: 0, sickles: 0, knuts: 1281 }
 * ```
 */

import {
  MoneyAmount,
  distributeAsGalleons,
  distributeAsKnuts,
  distributeAsSickles,
  toKnutCount,
  totalKnuts,
  validateCount,
} from '@wizmoney/core';
import { validateMoneyRecord } from './validation.js';
import type { MoneyRecord } from './validation.js';

export function createMoney(galleons: number = 0, sickles: number = 0, knuts: number = 0): MoneyRecord {
  return {
    galleons: validateCount(galleons, 'galleons'),
    sickles: validateCount(sickles, 'sickles'),
    knuts: validateCount(knuts, 'knuts'),
  };
}

export function copyMoney(record: MoneyRecord): MoneyRecord {
  return { galleons: record.galleons, sickles: record.sickles, knuts: record.knuts };
}

export function addMoney(a: MoneyRecord, b: MoneyRecord): MoneyRecord {
  return validated({
    galleons: a.galleons + b.galleons,
    sickles: a.sickles + b.sickles,
    knuts: a.knuts + b.knuts,
  });
}

export function subtractMoney(a: MoneyRecord, b: MoneyRecord): MoneyRecord {
  return validated({
    galleons: a.galleons - b.galleons,
    sickles: a.sickles - b.sickles,
    knuts: a.knuts - b.knuts,
  });
}

/**
 * Scale each denomination; n must be a whole number
 */
export function multiplyMoney(record: MoneyRecord, n: number): MoneyRecord {
  const factor = validateCount(n, 'multiplier');
  return validated({
    galleons: record.galleons * factor,
    sickles: record.sickles * factor,
    knuts: record.knuts * factor,
  });
}

export function convertToKnuts(record: MoneyRecord): MoneyRecord {
  return validated(distributeAsKnuts(record));
}

export function convertToSickles(record: MoneyRecord): MoneyRecord {
  return validated(distributeAsSickles(record));
}

export function convertToGalleons(record: MoneyRecord): MoneyRecord {
  return validated(distributeAsGalleons(record));
}

/**
 * Total worth in knuts
 */
export function getValue(record: MoneyRecord): number {
  return toKnutCount(totalKnuts(record), 'getValue');
}

export function toMoneyAmount(record: MoneyRecord): MoneyAmount {
  return MoneyAmount.fromDenominations(record);
}

export function fromMoneyAmount(amount: MoneyAmount): MoneyRecord {
  return amount.toJSON();
}

// Sums and products can leave the safe integer range; -0 is folded to 0 on the way
function validated(record: MoneyRecord): MoneyRecord {
  return validateMoneyRecord({
    galleons: record.galleons + 0,
    sickles: record.sickles + 0,
    knuts: record.knuts + 0,
  });
}
