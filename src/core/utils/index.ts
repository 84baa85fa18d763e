export * from './timestamp.js';
export * from './clock.js';
export * from './logger.js';
