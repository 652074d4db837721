export * from './logger.js';
export * from './utils.js';
