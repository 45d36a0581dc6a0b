import type { BaseRole, RoleName } from '../trust_types';
import { BaseRoles } from '../trust_types';
import type { SignedMetadata } from '../signed_metadata/signed_metadata.types';
import { RoleRegistry, isTopLevelRole } from '../role_registry/role_registry';
import type { RoleRegistryDependencies } from '../role_registry/role_registry.types';
import { DelegationResolver, isDelegationName } from '../delegation_resolver/delegation_resolver';
import { TargetCatalog } from '../target_catalog/target_catalog';

/**
 * Everything a session commits at once: roles, delegations, targets, the
 * signed metadata of every role and the generation number.
 */
export class TrustState {
  constructor(
    readonly registry: RoleRegistry,
    readonly resolver: DelegationResolver,
    readonly catalog: TargetCatalog,
    readonly metadata: Map<RoleName, SignedMetadata>,
    public generation: number
  ) {}

  static empty(dependencies: RoleRegistryDependencies): TrustState {
    const registry = new RoleRegistry(dependencies);
    const resolver = new DelegationResolver({ roles: registry });
    const catalog = new TargetCatalog({ resolver, signatures: registry });
    return new TrustState(registry, resolver, catalog, new Map(), 0);
  }

  isInitialized(): boolean {
    return this.registry.isInitialized();
  }

  /**
   * Top-level role or delegation.
   * @throws NotFoundError or UnknownDelegationError
   */
  baseRoleOf(name: RoleName): BaseRole {
    return isDelegationName(name) ? this.resolver.get(name) : this.registry.getBaseRole(name);
  }

  hasRole(name: RoleName): boolean {
    if (isDelegationName(name)) {
      return this.resolver.has(name);
    }
    return isTopLevelRole(name) && this.registry.isInitialized();
  }

  versionOf(name: RoleName): number {
    return this.metadata.get(name)?.payload.version ?? 0;
  }

  /**
   * `root`, then the targets tree in priority order: the roles snapshot pins.
   */
  pinnedRoles(): RoleName[] {
    return [BaseRoles.Root, ...this.resolver.priorityOrder()];
  }

  clone(): TrustState {
    const registry = this.registry.clone();
    const resolver = this.resolver.clone(registry);
    const catalog = this.catalog.clone(resolver, registry);
    const metadata = new Map(Array.from(this.metadata, ([name, entry]) => [name, structuredClone(entry)]));
    return new TrustState(registry, resolver, catalog, metadata, this.generation);
  }
}
