export { parseQuantity } from './quantity.js';
export type { QuantityInput } from './quantity.js';
