export * from './config.js';
export * from './errors.js';
export * from './logger.js';
export * from './server.js';
export type * from './types.js';
