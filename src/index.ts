// Analysis queue manager - public API
export * from './core/index.js';
export * from './scheduler/optimization-scheduler.js';
