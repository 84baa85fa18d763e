export * from './job-store.js';
export * from './analysis-history.js';
export * from './queue-manager.js';
