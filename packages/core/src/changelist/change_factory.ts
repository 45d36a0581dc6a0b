import type { Change } from '../trust_types';
import { CHANGE_ACTIONS } from '../trust_types';
import { DetailedValidationError } from '../trust_errors';
import type { FieldError } from '../trust_errors';

/**
 * Builds a frozen Change. Every change, staged locally or reconstituted
 * from a stored or remote list, goes through here.
 *
 * @throws DetailedValidationError for an empty scope or type, or an unknown action
 */
export function createChange(
  action: string,
  scope: string,
  type: string,
  path: string,
  content: Uint8Array
): Change {
  const errors: FieldError[] = [];
  const knownAction = CHANGE_ACTIONS.find(candidate => candidate === action);
  if (!knownAction) {
    errors.push({ field: 'action', message: `must be one of ${CHANGE_ACTIONS.join(', ')}`, value: action });
  }
  if (!scope) {
    errors.push({ field: 'scope', message: 'must not be empty', value: scope });
  }
  if (!type) {
    errors.push({ field: 'type', message: 'must not be empty', value: type });
  }
  if (!knownAction || errors.length > 0) {
    throw new DetailedValidationError('Change', errors);
  }

  return Object.freeze({
    action: knownAction,
    scope,
    type,
    path,
    content: Uint8Array.from(content),
  });
}
