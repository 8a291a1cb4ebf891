// Re-export everything from sub-modules
export * from './json.js';
export * from './string.js';
