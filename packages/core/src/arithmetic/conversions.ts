/**
 * Denomination conversions
 * Pure functions over Denominations records. Remainders cascade upward
 * (knuts -> sickles -> galleons) in a single pass using floor division,
 * so the total value never changes.
 */

import { KNUTS_PER_GALLEON, KNUTS_PER_SICKLE, SICKLES_PER_GALLEON } from '../constants.js';
import type { Denominations } from '../types/index.js';
import { floorDiv, floorMod } from './integer-math.js';

/**
 * Total worth of a distribution, in knuts
 * Exact whenever the total is a safe integer, even if galleons * 493 is not;
 * an unsafe total comes back as a number outside the safe integer range.
 */
export function totalKnuts(amount: Denominations): number {
  const { galleons, sickles, knuts } = amount;
  if (!Number.isSafeInteger(galleons) || !Number.isSafeInteger(sickles) || !Number.isSafeInteger(knuts)) {
    return galleons * KNUTS_PER_GALLEON + sickles * KNUTS_PER_SICKLE + knuts;
  }
  const exact =
    BigInt(galleons) * BigInt(KNUTS_PER_GALLEON) + BigInt(sickles) * BigInt(KNUTS_PER_SICKLE) + BigInt(knuts);
  return Number(exact);
}

/**
 * Everything as knuts
 * (5, 2, 10) -> (0, 0, 2533)
 */
export function distributeAsKnuts(amount: Denominations): Denominations {
  return { galleons: 0, sickles: 0, knuts: totalKnuts(amount) + 0 };
}

/**
 * Galleons and whole sickles' worth of knuts become sickles; the rest stays as knuts
 * (5, 2, 10) -> (0, 87, 10)
 */
export function distributeAsSickles(amount: Denominations): Denominations {
  return {
    galleons: 0,
    sickles: amount.sickles + amount.galleons * SICKLES_PER_GALLEON + floorDiv(amount.knuts, KNUTS_PER_SICKLE) + 0,
    knuts: floorMod(amount.knuts, KNUTS_PER_SICKLE),
  };
}

/**
 * Largest denominations first; sickles land in [0, 17) and knuts in [0, 29)
 * (0, 200, 1000) -> (13, 13, 14)
 * (0, 0, -1)     -> (-1, 16, 28)
 */
export function distributeAsGalleons(amount: Denominations): Denominations {
  const sickles = amount.sickles + floorDiv(amount.knuts, KNUTS_PER_SICKLE);
  return {
    galleons: amount.galleons + floorDiv(sickles, SICKLES_PER_GALLEON) + 0,
    sickles: floorMod(sickles, SICKLES_PER_GALLEON),
    knuts: floorMod(amount.knuts, KNUTS_PER_SICKLE),
  };
}
