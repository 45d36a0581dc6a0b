import type { TrustConfig } from '../config_manager/config_manager.types';
import { assertValid, validateDetailed } from './common';
import type { ValidationResult } from './common';

export function validateTrustConfigDetailed(data: unknown): ValidationResult {
  return validateDetailed('TrustConfig', data);
}

/**
 * Loads and validates a TrustConfig read from an untrusted source.
 */
export function loadTrustConfig(data: unknown): TrustConfig {
  return assertValid<TrustConfig>('TrustConfig', 'TrustConfig', data);
}
