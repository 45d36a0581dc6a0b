import type { BaseRole, GUN, KeyAlgorithm, Role, RoleName, RoleWithSignatures, Signature } from '../trust_types';
import type { CryptoService } from '../crypto_service/crypto_service.types';
import type { RemoteAuthority } from '../remote_authority/remote_authority';
import type { Logger } from '../logger';

/**
 * Role Registry - the top-level roles of one GUN and the signatures over
 * each role's current metadata.
 */
export interface IRoleRegistry {
  isInitialized(): boolean;

  /**
   * Creates root from existing custody keys (threshold 1), a local
   * `targets` key, and `snapshot`/`timestamp` keys held locally or by the
   * remote authority.
   */
  initialize(rootKeyIds: string[], serverManagedRoles: RoleName[]): Promise<void>;

  /**
   * @throws NotFoundError for a name that is not a top-level role
   */
  getRole(name: RoleName): Role;

  /**
   * Top-level roles in registration order.
   */
  listRoles(): RoleWithSignatures[];

  /**
   * True iff the distinct keys of `role` with a verifying signature over
   * `payload` reach the role's threshold.
   */
  verifyThreshold(role: BaseRole, signatures: Signature[], payload: Uint8Array): boolean;

  invalidateRole(name: RoleName): void;
}

export interface RoleRegistryDependencies {
  gun: GUN;
  crypto: CryptoService;
  remote?: RemoteAuthority;
  /** Algorithm for keys the registry creates (default: ed25519) */
  keyAlgorithm?: KeyAlgorithm;
  logger?: Logger;
}
