export * from './queue-configurations.js';
export * from './manager-config.js';
