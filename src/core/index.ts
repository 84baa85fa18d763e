// Core module exports
export * from './types/index.js';
export * from './interfaces/index.js';
export * from './config/index.js';
export * from './errors.js';
export * from './validation.js';
export * from './complexity-estimator.js';
export * from './queue-classifier.js';
export * from './priority-calculator.js';
export * from './load-monitor.js';
export * from './queue-manager.js';
export * from './redis-job-store.js';
export * from './redis-analysis-history.js';
export * from './utils/index.js';
