import type { BaseRole, Change, DelegationEdit, RoleName } from '../trust_types';
import { BaseRoles, ChangeTypes } from '../trust_types';
import { parentOf } from '../delegation_resolver/delegation_resolver';
import type { DelegationAction } from '../delegation_resolver/delegation_resolver.types';
import { DetailedValidationError } from '../trust_errors';
import { decodeDelegationEdit, decodeRoleKeyEdit } from '../validation/change_content_validator';
import type { TrustState } from './trust_state';

const EMPTY_EDIT: DelegationEdit = {
  addKeys: [],
  removeKeys: [],
  addPaths: [],
  removePaths: [],
  clearAllPaths: false,
};

/**
 * What folding a run of changes did to a state.
 */
export class FoldResult {
  readonly touched = new Set<RoleName>();
  /** Root as it was before the first root rotation in the run */
  previousRoot: BaseRole | null = null;
}

/**
 * Applies one change to `state` in place, recording the roles whose
 * metadata it invalidates.
 */
export function applyChange(state: TrustState, change: Change, result: FoldResult): void {
  switch (change.type) {
    case ChangeTypes.Target:
      state.catalog.applyTargetChange(change);
      result.touched.add(change.scope);
      return;

    case ChangeTypes.Delegation: {
      const action: DelegationAction = change.action;
      const edit = action === 'delete' ? EMPTY_EDIT : decodeDelegationEdit(change.content);
      const { removed } = state.resolver.applyDelegationChange(action, change.scope, edit);
      state.catalog.removeRoles(removed);
      for (const role of removed) {
        state.registry.deleteSignatures(role);
        state.metadata.delete(role);
        result.touched.delete(role);
      }
      result.touched.add(parentOf(change.scope));
      return;
    }

    case ChangeTypes.Role: {
      const edit = decodeRoleKeyEdit(change.content);
      if (change.scope === BaseRoles.Root && !result.previousRoot) {
        result.previousRoot = state.registry.getBaseRole(BaseRoles.Root);
      }
      state.registry.setRoleKeys(change.scope, edit.keys, edit.threshold ?? 1, edit.serverManaged);
      result.touched.add(change.scope);
      result.touched.add(BaseRoles.Root);
      return;
    }

    case ChangeTypes.Witness:
      // A role removed since the witness was staged has nothing left to sign.
      if (state.hasRole(change.scope)) {
        result.touched.add(change.scope);
      }
      return;

    default:
      throw new DetailedValidationError('Change', [
        { field: 'type', message: 'unknown change type', value: change.type },
      ]);
  }
}

/**
 * Folds changes in order. Later changes to the same scope and path
 * overwrite earlier ones.
 */
export function foldChanges(state: TrustState, changes: readonly Change[]): FoldResult {
  const result = new FoldResult();
  for (const change of changes) {
    applyChange(state, change, result);
  }
  return result;
}
