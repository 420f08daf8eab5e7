export * from './config.js';
export * from './results.js';
