import type { BaseRole, DelegationEdit, DelegationRole, RoleName } from '../trust_types';
import type { Logger } from '../logger';

/**
 * Where the resolver reads the top-level `targets` role from.
 */
export interface TargetsRoleSource {
  getBaseRole(name: RoleName): BaseRole;
}

export interface DelegationResolverDependencies {
  roles: TargetsRoleSource;
  logger?: Logger;
}

export type DelegationAction = 'create' | 'update' | 'delete';

export interface DelegationChangeResult {
  /** Delegation left in place by a create or update */
  delegation: DelegationRole | null;
  /** Delegations removed by a delete, the named one first */
  removed: RoleName[];
}

/**
 * Delegation Resolver - the delegation tree under `targets` and which
 * roles may sign for a path.
 */
export interface IDelegationResolver {
  has(name: RoleName): boolean;

  /**
   * @throws UnknownDelegationError
   */
  get(name: RoleName): DelegationRole;

  /** Registration order */
  listDelegations(): DelegationRole[];

  /**
   * Delegations whose own paths and every ancestor's paths match `path`,
   * deepest first, then `targets`.
   */
  resolveForPath(path: string): DelegationRole[];

  covers(role: RoleName, path: string): boolean;

  /**
   * `targets` followed by every delegation, breadth first, children in
   * registration order.
   */
  priorityOrder(): RoleName[];

  applyDelegationChange(action: DelegationAction, name: RoleName, edit: DelegationEdit): DelegationChangeResult;
}
