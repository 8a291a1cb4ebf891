export * from './validation-error.js';
export * from './schema-validator.js';
export { DRAFT4_KEYWORDS, Draft4Validator, typesMessage } from './draft4.js';
export * from './openapi.js';
export * from './formats.js';
