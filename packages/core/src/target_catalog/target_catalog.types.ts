import type { Change, RoleName, Signature, TargetSignedStruct, TargetWithRole } from '../trust_types';
import type { DelegationResolver } from '../delegation_resolver/delegation_resolver';
import type { Logger } from '../logger';

/**
 * Where the catalog reads a role's current metadata signatures from.
 */
export interface SignatureSource {
  getSignatures(name: RoleName): Signature[];
}

export interface TargetCatalogDependencies {
  resolver: DelegationResolver;
  signatures: SignatureSource;
  logger?: Logger;
}

/**
 * Target Catalog - the targets each role currently signs for.
 */
export interface ITargetCatalog {
  /**
   * @throws PathNotAuthorizedError when the role does not cover the target name
   */
  applyTargetChange(change: Change): void;

  /**
   * One entry per name. With no roles, the highest-priority holder wins;
   * otherwise only the given roles, first wins.
   */
  listTargets(roles?: RoleName[]): TargetWithRole[];

  /**
   * @throws NotFoundError
   */
  getTargetByName(name: string, roles?: RoleName[]): TargetWithRole;

  /**
   * @throws NotFoundError when no role holds the name
   */
  getAllTargetMetadataByName(name: string): TargetSignedStruct[];
}
