import type { Change, RoleName, Target, TargetSignedStruct, TargetWithRole } from '../trust_types';
import { BaseRoles } from '../trust_types';
import type { DelegationResolver } from '../delegation_resolver/delegation_resolver';
import { isDelegationName } from '../delegation_resolver/delegation_resolver';
import type { Logger } from '../logger';
import type { ITargetCatalog, SignatureSource, TargetCatalogDependencies } from './target_catalog.types';
import { InvalidRoleError, NotFoundError, PathNotAuthorizedError, UnknownDelegationError } from '../trust_errors';
import { decodeTargetMeta } from '../validation/change_content_validator';
import { createLogger } from '../logger';

function copyTarget(target: Target): Target {
  return { name: target.name, length: target.length, hashes: { ...target.hashes } };
}

/**
 * TargetCatalog
 *
 * Targets are held per role. Authorization is checked against the
 * resolver when a change is applied and again when reading, so targets of
 * a role whose paths shrank stop being listed.
 */
export class TargetCatalog implements ITargetCatalog {
  private readonly resolver: DelegationResolver;
  private readonly signatures: SignatureSource;
  private readonly logger: Logger;
  private targets = new Map<RoleName, Map<string, Target>>();

  constructor(dependencies: TargetCatalogDependencies) {
    this.resolver = dependencies.resolver;
    this.signatures = dependencies.signatures;
    this.logger = dependencies.logger ?? createLogger('[TargetCatalog] ');
  }

  applyTargetChange(change: Change): void {
    const role = change.scope;
    const name = change.path;
    if (role !== BaseRoles.Targets && !this.resolver.has(role)) {
      if (isDelegationName(role)) {
        throw new UnknownDelegationError(role);
      }
      throw new InvalidRoleError(role, 'only targets and its delegations hold targets');
    }
    if (!this.resolver.covers(role, name)) {
      throw new PathNotAuthorizedError(role, name);
    }

    if (change.action === 'delete') {
      this.targets.get(role)?.delete(name);
      return;
    }

    const meta = decodeTargetMeta(change.content);
    const roleTargets = this.targets.get(role) ?? new Map<string, Target>();
    roleTargets.set(name, { name, length: meta.length, hashes: { ...meta.hashes } });
    this.targets.set(role, roleTargets);
  }

  /**
   * Drops every target of the named roles (deleted delegations).
   */
  removeRoles(roles: RoleName[]): void {
    for (const role of roles) {
      const count = this.targets.get(role)?.size ?? 0;
      if (this.targets.delete(role) && count > 0) {
        this.logger.debug(`Dropped ${count} target(s) of ${role}`);
      }
    }
  }

  /**
   * Targets held directly by one role, whether or not it still covers them.
   */
  targetsOf(role: RoleName): Target[] {
    return Array.from(this.targets.get(role)?.values() ?? [], copyTarget);
  }

  listTargets(roles: RoleName[] = []): TargetWithRole[] {
    const order = roles.length > 0 ? roles : this.resolver.priorityOrder();
    const seen = new Set<string>();
    const result: TargetWithRole[] = [];
    for (const role of order) {
      for (const target of this.targets.get(role)?.values() ?? []) {
        if (seen.has(target.name) || !this.resolver.covers(role, target.name)) {
          continue;
        }
        seen.add(target.name);
        result.push({ target: copyTarget(target), role });
      }
    }
    return result;
  }

  getTargetByName(name: string, roles: RoleName[] = []): TargetWithRole {
    const order = roles.length > 0 ? roles : this.resolver.priorityOrder();
    for (const role of order) {
      const target = this.targets.get(role)?.get(name);
      if (target && this.resolver.covers(role, name)) {
        return { target: copyTarget(target), role };
      }
    }
    throw new NotFoundError('target', name);
  }

  getAllTargetMetadataByName(name: string): TargetSignedStruct[] {
    const result: TargetSignedStruct[] = [];
    for (const role of this.resolver.priorityOrder()) {
      const target = this.targets.get(role)?.get(name);
      if (target && this.resolver.covers(role, name)) {
        result.push({
          role: this.resolver.viewOf(role),
          target: copyTarget(target),
          signatures: this.signatures.getSignatures(role),
        });
      }
    }
    if (result.length === 0) {
      throw new NotFoundError('target', name);
    }
    return result;
  }

  clone(resolver: DelegationResolver = this.resolver, signatures: SignatureSource = this.signatures): TargetCatalog {
    const copy = new TargetCatalog({ resolver, signatures, logger: this.logger });
    copy.targets = new Map(Array.from(this.targets, ([role, targets]) => [
      role,
      new Map(Array.from(targets, ([name, target]) => [name, copyTarget(target)])),
    ]));
    return copy;
  }
}
