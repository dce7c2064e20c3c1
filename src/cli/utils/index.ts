export * from './command-helpers.js';
export * from './error-handler.js';
export * from './services.js';
