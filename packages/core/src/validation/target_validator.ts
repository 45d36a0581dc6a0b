import type { Target, TargetMeta } from '../trust_types';
import { assertValid, validateDetailed } from './common';
import type { ValidationResult } from './common';

export function validateTargetDetailed(data: unknown): ValidationResult {
  return validateDetailed('Target', data);
}

/**
 * Type guard to check if data is a well-formed Target
 */
export function isTarget(data: unknown): data is Target {
  return validateTargetDetailed(data).isValid;
}

export function loadTarget(data: unknown): Target {
  return assertValid<Target>('Target', 'Target', data);
}

export function loadTargetMeta(data: unknown): TargetMeta {
  return assertValid<TargetMeta>('TargetMeta', 'TargetMeta', data);
}
