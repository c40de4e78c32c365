/**
 * Logging Utilities - Safe object serialization for logging
 */

import { isMoneyError } from '../errors/index.js';

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors. Objects with a toJSON() (MoneyAmount) use it.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Create a safe log object from an error
 * Money errors also contribute their structured details (and the rejected quantity for FormatError).
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const entry: Record<string, unknown> = {
      type: error.name,
      message: error.message,
    };
    if (isMoneyError(error)) {
      if ('quantity' in error) entry.quantity = error.quantity;
      if (error.details) entry.details = serializeForLog(error.details);
    }
    entry.stack = error.stack;
    return entry;
  }

  if (typeof error === 'object' && error !== null) {
    return { type: 'object', value: serializeForLog(error) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
