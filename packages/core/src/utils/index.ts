/**
 * Utility functions
 */

export { serializeForLog, errorToLog } from './logging.js';
