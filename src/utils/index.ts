export * from './errors.js';
export * from './exec.js';
export * from './fs-helpers.js';
export * from './logger.js';
export * from './parser.js';
export * from './retry.js';
export * from './mutex.js';
