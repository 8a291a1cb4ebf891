// src/core/types.ts

/**
 * @fileoverview
 * Central re-export of the schema value types and the option/config interfaces
 * shared by the resolver, the validators and the CLI.
 */
export * from './types/index.js';
