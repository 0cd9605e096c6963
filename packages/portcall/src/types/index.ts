export * from './address.types.js';
export * from './config.types.js';
export * from './error.types.js';
export * from './logger.types.js';
export * from './outcome.types.js';
export * from './registry.types.js';
export * from './request.types.js';
