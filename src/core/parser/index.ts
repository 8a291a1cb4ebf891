export * from './json-pointer.js';
export * from './reference-resolver.js';
export * from './spec-loader.js';
