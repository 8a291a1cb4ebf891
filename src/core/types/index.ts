export * from './schema.js';
export * from './config.js';
