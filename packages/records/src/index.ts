export {
  createMoney,
  copyMoney,
  addMoney,
  subtractMoney,
  multiplyMoney,
  convertToKnuts,
  convertToSickles,
  convertToGalleons,
  getValue,
  toMoneyAmount,
  fromMoneyAmount,
} from './money.js';

export { MoneyRecordSchema, validateMoneyRecord, safeValidateMoneyRecord } from './validation.js';
export type { MoneyRecord } from './validation.js';
