import type { ErrorObject } from "ajv";
import { SchemaValidationCache } from '../trust_schemas';
import type { SchemaName } from '../trust_schemas';
import { DetailedValidationError } from '../trust_errors';
import type { FieldError } from '../trust_errors';

/**
 * Standard validation result shared by every validateXDetailed function.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): FieldError[] {
  return (errors || []).map((error: ErrorObject) => ({
    field: error.instancePath?.replace(/^\//, '') || error.params?.['missingProperty'] || 'root',
    message: error.message || 'Unknown validation error',
    value: error.data,
  }));
}

export function validateDetailed(schema: SchemaName, data: unknown): ValidationResult {
  const validator = SchemaValidationCache.getValidator(schema);
  if (validator(data)) {
    return { isValid: true, errors: [] };
  }
  return { isValid: false, errors: formatAjvErrors(validator.errors) };
}

/**
 * Narrows untrusted data to T or throws DetailedValidationError.
 */
export function assertValid<T>(schema: SchemaName, entity: string, data: unknown): T {
  const validator = SchemaValidationCache.getValidator<T>(schema);
  if (validator(data)) {
    return data;
  }
  throw new DetailedValidationError(entity, formatAjvErrors(validator.errors));
}
