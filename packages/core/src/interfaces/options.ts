import type { Logger } from './logger.js';

/**
 * Options accepted by the quantity parser
 */
export interface ParseOptions {
  /**
   * Optional logger instance
   * Receives a debug entry per parsed input and a warn entry before a rejection is thrown
   */
  logger?: Logger;
}

/**
 * Options for MoneyAmount.format()
 */
export interface FormatOptions {
  /**
   * Text placed between denominations
   * Default: ", " (the canonical form)
   * Must contain a comma for the output to parse back
   */
  separator?: string;

  /**
   * Drop denominations whose count is zero
   * An amount with every count at zero renders as "0k"
   * Default: false
   */
  omitZero?: boolean;
}
