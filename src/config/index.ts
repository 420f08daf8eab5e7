export * from './defaults.js';
export * from './schema.js';
export { resolveConfig, currentHost, expandHome, resolveUid } from './manager.js';
export type { HostInfo } from './manager.js';
export { parseArgs } from './cli.js';
