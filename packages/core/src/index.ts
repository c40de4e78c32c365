// Constants
export {
  KNUTS_PER_SICKLE,
  SICKLES_PER_GALLEON,
  KNUTS_PER_GALLEON,
  UNIT_SUFFIXES,
} from './constants.js';

// Domain types
export * from './types/index.js';

// Interfaces and options
export * from './interfaces/index.js';

// Errors
export {
  FormatError,
  MoneyTypeError,
  MoneyValueError,
  isMoneyError,
} from './errors/index.js';
export type { MoneyError } from './errors/index.js';

// Validation
export {
  DenominationCountSchema,
  DenominationsSchema,
  validateCount,
  validateScalar,
} from './validation.js';

// Arithmetic on plain records
export * from './arithmetic/index.js';

// Parser
export * from './parser/index.js';

// Value type
export * from './money/index.js';

// Utilities
export { serializeForLog, errorToLog } from './utils/index.js';
