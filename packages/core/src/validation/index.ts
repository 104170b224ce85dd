export { SchemaValidationCache, validateSchema, formatErrors, SCHEMA_DIR } from './schema_cache';
export type { SchemaName } from './schema_cache';
export { SchemaValidationError } from './errors';
export type { FieldError } from './errors';
