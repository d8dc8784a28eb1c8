/**
 * Public type exports for `@keystroke/core`.
 */
export * from './cache.js';
export * from './fetch.js';
export * from './handler.js';
export * from './runner.js';
