export type { Logger } from './logger.js';
export type { ParseOptions, FormatOptions } from './options.js';
