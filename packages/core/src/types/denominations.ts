/**
 * Denominations
 * Independent signed counts of each coin; no range is implied
 * (12 sickles and 400 knuts is a valid distribution)
 */
export interface Denominations {
  galleons: number;
  sickles: number;
  knuts: number;
}

/**
 * Names of the three denomination fields, largest first
 */
export type Denomination = keyof Denominations;

export const DENOMINATIONS: readonly Denomination[] = ['galleons', 'sickles', 'knuts'];
