export { MoneyAmount } from './money-amount.js';
export type { MoneyOperand } from './money-amount.js';
export { parse } from './parse.js';
