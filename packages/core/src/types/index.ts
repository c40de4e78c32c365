export type { Denominations, Denomination } from './denominations.js';
export { DENOMINATIONS } from './denominations.js';
