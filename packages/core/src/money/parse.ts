import type { ParseOptions } from '../interfaces/index.js';
import { parseQuantity } from '../parser/index.js';
import type { QuantityInput } from '../parser/index.js';
import { MoneyAmount } from './money-amount.js';

/**
 * Parse a quantity string ("5g, -2s, 10k") or a knut count into a new MoneyAmount
 *
 * ```typescript
 * parse('5g, 10k');     // MoneyAmount(galleons=5, sickles=0, knuts=10)
 * parse('3g, 3g, -5g'); // MoneyAmount(galleons=1, sickles=0, knuts=0)
 * parse(10);            // MoneyAmount(galleons=0, sickles=0, knuts=10)
 * ```
 */
export function parse(input: QuantityInput, options?: ParseOptions): MoneyAmount {
  return MoneyAmount.fromDenominations(parseQuantity(input, options));
}
