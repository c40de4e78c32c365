/**
 * Denomination ratios
 * 29 knuts make a sickle and 17 sickles make a galleon
 */

export const KNUTS_PER_SICKLE = 29;

export const SICKLES_PER_GALLEON = 17;

export const KNUTS_PER_GALLEON = SICKLES_PER_GALLEON * KNUTS_PER_SICKLE;

/**
 * Unit abbreviations used in quantity strings ("5g, 2s, 10k")
 */
export const UNIT_SUFFIXES = {
  galleons: 'g',
  sickles: 's',
  knuts: 'k',
} as const;
