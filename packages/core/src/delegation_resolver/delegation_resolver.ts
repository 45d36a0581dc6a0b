import type { DelegationEdit, DelegationRole, PublicKey, RoleName } from '../trust_types';
import { BaseRoles } from '../trust_types';
import type { Logger } from '../logger';
import type {
  DelegationAction,
  DelegationChangeResult,
  DelegationResolverDependencies,
  IDelegationResolver,
  TargetsRoleSource,
} from './delegation_resolver.types';
import { InvalidRoleError, PathConflictError, UnknownDelegationError } from '../trust_errors';
import { assertThresholdBounds } from '../role_registry/role_registry';
import { matchesAny, patternsOutside } from './path_patterns';
import { createLogger } from '../logger';

const DELEGATION_NAME = /^targets(\/[^/]+)+$/;

export function isDelegationName(name: RoleName): boolean {
  return DELEGATION_NAME.test(name);
}

/**
 * `targets/a/b` → `targets/a`. Only meaningful for delegation names.
 */
export function parentOf(name: RoleName): RoleName {
  return name.slice(0, name.lastIndexOf('/'));
}

function depthOf(name: RoleName): number {
  return name.split('/').length;
}

function copyDelegation(role: DelegationRole): DelegationRole {
  return { name: role.name, keys: { ...role.keys }, threshold: role.threshold, paths: [...role.paths] };
}

function withoutKeys(keys: Record<string, PublicKey>, removed: readonly string[]): Record<string, PublicKey> {
  return Object.fromEntries(Object.entries(keys).filter(([keyId]) => !removed.includes(keyId)));
}

/**
 * DelegationResolver
 *
 * Delegations are kept in registration order. Re-creating a deleted
 * delegation registers it again at the end.
 */
export class DelegationResolver implements IDelegationResolver {
  private readonly roles: TargetsRoleSource;
  private readonly logger: Logger;
  private delegations = new Map<RoleName, DelegationRole>();

  constructor(dependencies: DelegationResolverDependencies) {
    this.roles = dependencies.roles;
    this.logger = dependencies.logger ?? createLogger('[DelegationResolver] ');
  }

  has(name: RoleName): boolean {
    return this.delegations.has(name);
  }

  get(name: RoleName): DelegationRole {
    const role = this.delegations.get(name);
    if (!role) {
      throw new UnknownDelegationError(name);
    }
    return copyDelegation(role);
  }

  listDelegations(): DelegationRole[] {
    return Array.from(this.delegations.values(), copyDelegation);
  }

  childrenOf(name: RoleName): DelegationRole[] {
    return this.listDelegations().filter(role => parentOf(role.name) === name);
  }

  /**
   * Paths a role may sign for on its own: everything for `targets`.
   */
  pathsOf(name: RoleName): string[] {
    if (name === BaseRoles.Targets) {
      return [''];
    }
    return [...(this.delegations.get(name)?.paths ?? [])];
  }

  /**
   * `targets` or a delegation viewed as a DelegationRole.
   * @throws UnknownDelegationError for anything else
   */
  viewOf(name: RoleName): DelegationRole {
    if (name === BaseRoles.Targets) {
      return { ...this.roles.getBaseRole(BaseRoles.Targets), paths: [''] };
    }
    return this.get(name);
  }

  covers(role: RoleName, path: string): boolean {
    if (role === BaseRoles.Targets) {
      return true;
    }
    const delegation = this.delegations.get(role);
    if (!delegation || !matchesAny(delegation.paths, path)) {
      return false;
    }
    return this.covers(parentOf(role), path);
  }

  resolveForPath(path: string): DelegationRole[] {
    const matching = this.listDelegations()
      .filter(role => this.covers(role.name, path))
      .sort((a, b) => depthOf(b.name) - depthOf(a.name));
    return [...matching, this.viewOf(BaseRoles.Targets)];
  }

  priorityOrder(): RoleName[] {
    const order: RoleName[] = [];
    const queue: RoleName[] = [BaseRoles.Targets];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      order.push(current);
      queue.push(...this.childrenOf(current).map(child => child.name));
    }
    return order;
  }

  /**
   * Folds one delegation change into the tree.
   *
   * A create on an existing delegation edits it in place. A delete takes
   * every descendant with it and is a no-op for an absent delegation.
   *
   * @throws InvalidRoleError when the name is not a delegation name or the threshold leaves 1..|keys|
   * @throws UnknownDelegationError when the parent (create) or the delegation (update) is missing
   * @throws PathConflictError when added paths fall outside the parent's paths
   */
  applyDelegationChange(action: DelegationAction, name: RoleName, edit: DelegationEdit): DelegationChangeResult {
    if (!isDelegationName(name)) {
      throw new InvalidRoleError(name, 'delegation names have the form targets/<name>');
    }

    if (action === 'delete') {
      const removed = this.removeSubtree(name);
      if (removed.length > 0) {
        this.logger.debug(`Removed delegations ${removed.join(', ')}`);
      }
      return { delegation: null, removed };
    }

    const parent = parentOf(name);
    if (parent !== BaseRoles.Targets && !this.delegations.has(parent)) {
      throw new UnknownDelegationError(parent);
    }

    const existing = this.delegations.get(name);
    if (!existing && action === 'update') {
      throw new UnknownDelegationError(name);
    }
    const current: DelegationRole = existing ? copyDelegation(existing) : { name, keys: {}, threshold: 1, paths: [] };

    const outside = patternsOutside(edit.addPaths, this.pathsOf(parent));
    if (outside.length > 0) {
      throw new PathConflictError(name, parent, outside);
    }

    let paths = edit.clearAllPaths ? [] : current.paths;
    paths = paths.filter(path => !edit.removePaths.includes(path));
    for (const path of edit.addPaths) {
      if (!paths.includes(path)) {
        paths.push(path);
      }
    }

    const keys = withoutKeys(current.keys, edit.removeKeys);
    for (const key of edit.addKeys) {
      keys[key.keyId] = { ...key };
    }

    const threshold = edit.newThreshold ?? current.threshold;
    assertThresholdBounds(name, Object.keys(keys).length, threshold);

    const updated: DelegationRole = { name, keys, threshold, paths };
    this.delegations.set(name, updated);
    return { delegation: copyDelegation(updated), removed: [] };
  }

  private removeSubtree(name: RoleName): RoleName[] {
    const removed = Array.from(this.delegations.keys()).filter(
      candidate => candidate === name || candidate.startsWith(`${name}/`)
    );
    for (const role of removed) {
      this.delegations.delete(role);
    }
    return removed;
  }

  /**
   * Independent copy reading `targets` from another role source.
   */
  clone(roles: TargetsRoleSource = this.roles): DelegationResolver {
    const copy = new DelegationResolver({ roles, logger: this.logger });
    copy.delegations = new Map(Array.from(this.delegations, ([name, role]) => [name, copyDelegation(role)]));
    return copy;
  }
}
