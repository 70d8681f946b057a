/**
 * Options Module Index
 * ====================
 */

export * from './options.types.js';
export { validateTypeSpec, convertValue } from './options.typespec.js';
export { OptionSchema, buildSchema } from './options.schema.js';
