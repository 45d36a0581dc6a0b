export { SchemaValidationCache, Schemas } from './schema_cache';
export type { SchemaName } from './schema_cache';
