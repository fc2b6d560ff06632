export * from './types.js';
export * from './factory-config.js';
export * from './errors.js';
export * from './wire.js';
export * from './topics.js';
export * from './logger.js';
export * from './config.js';
