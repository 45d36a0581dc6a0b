import type {
  BaseRole,
  BaseRoleName,
  GUN,
  KeyAlgorithm,
  PublicKey,
  Role,
  RoleName,
  RoleWithSignatures,
  Signature,
} from '../trust_types';
import { BaseRoles, SERVER_MANAGEABLE_ROLES, TOP_LEVEL_ROLES } from '../trust_types';
import type { CryptoService } from '../crypto_service/crypto_service.types';
import type { RemoteAuthority } from '../remote_authority/remote_authority';
import type { Logger } from '../logger';
import type { IRoleRegistry, RoleRegistryDependencies } from './role_registry.types';
import { InvalidRoleError, InvalidRootKeysError, NotFoundError, UnimplementedError } from '../trust_errors';
import { sha256Hex } from '../crypto/checksum';
import { createLogger } from '../logger';

type RoleEntry = {
  role: BaseRole;
  serverManaged: boolean;
};

export function isTopLevelRole(name: RoleName): name is BaseRoleName {
  return TOP_LEVEL_ROLES.some(candidate => candidate === name);
}

export function isServerManageable(name: RoleName): boolean {
  return SERVER_MANAGEABLE_ROLES.some(candidate => candidate === name);
}

/**
 * Checks `1 <= threshold <= |keys|`.
 * @throws InvalidRoleError
 */
export function assertThresholdBounds(name: RoleName, keyCount: number, threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new InvalidRoleError(name, `threshold must be a positive integer, got ${threshold}`);
  }
  if (threshold > keyCount) {
    throw new InvalidRoleError(name, `threshold ${threshold} exceeds the ${keyCount} key(s) of the role`);
  }
}

function keysOf(keys: PublicKey[]): Record<string, PublicKey> {
  return Object.fromEntries(keys.map(key => [key.keyId, { ...key }]));
}

function copyRole(role: BaseRole): BaseRole {
  return { name: role.name, keys: { ...role.keys }, threshold: role.threshold };
}

/**
 * RoleRegistry
 *
 * Holds `root`, `targets`, `snapshot` and `timestamp` in registration
 * order, which roles are server-managed, and the signatures over the
 * current metadata of every role (delegations included).
 */
export class RoleRegistry implements IRoleRegistry {
  private readonly gun: GUN;
  private readonly crypto: CryptoService;
  private readonly remote: RemoteAuthority | undefined;
  private readonly keyAlgorithm: KeyAlgorithm;
  private readonly logger: Logger;

  private roles = new Map<BaseRoleName, RoleEntry>();
  private signatures = new Map<RoleName, Signature[]>();
  private verificationCache = new Map<RoleName, Map<string, boolean>>();

  constructor(dependencies: RoleRegistryDependencies) {
    this.gun = dependencies.gun;
    this.crypto = dependencies.crypto;
    this.remote = dependencies.remote;
    this.keyAlgorithm = dependencies.keyAlgorithm ?? 'ed25519';
    this.logger = dependencies.logger ?? createLogger('[RoleRegistry] ');
  }

  isInitialized(): boolean {
    return this.roles.has(BaseRoles.Root);
  }

  async initialize(rootKeyIds: string[], serverManagedRoles: RoleName[]): Promise<void> {
    for (const role of serverManagedRoles) {
      if (!isServerManageable(role)) {
        throw new InvalidRoleError(role, 'only snapshot and timestamp keys can be managed by the server');
      }
    }
    const remote = this.remote;
    if (serverManagedRoles.length > 0 && !remote) {
      throw new UnimplementedError('server-managed roles', 'no remote authority is configured');
    }

    const rootKeys: PublicKey[] = [];
    const unknown: string[] = [];
    for (const keyId of new Set(rootKeyIds)) {
      const key = await this.crypto.getKey(keyId);
      if (key) {
        rootKeys.push(key);
      } else {
        unknown.push(keyId);
      }
    }
    if (unknown.length > 0 || rootKeys.length === 0) {
      throw new InvalidRootKeysError(unknown);
    }

    const targetsKey = await this.crypto.create(BaseRoles.Targets, this.gun, this.keyAlgorithm);
    const roles = new Map<BaseRoleName, RoleEntry>();
    roles.set(BaseRoles.Root, { role: { name: BaseRoles.Root, keys: keysOf(rootKeys), threshold: 1 }, serverManaged: false });
    roles.set(BaseRoles.Targets, { role: { name: BaseRoles.Targets, keys: keysOf([targetsKey]), threshold: 1 }, serverManaged: false });

    for (const name of [BaseRoles.Snapshot, BaseRoles.Timestamp]) {
      const serverManaged = serverManagedRoles.includes(name);
      const key = serverManaged && remote
        ? await remote.getRoleKey(this.gun, name)
        : await this.crypto.create(name, this.gun, this.keyAlgorithm);
      roles.set(name, { role: { name, keys: keysOf([key]), threshold: 1 }, serverManaged });
    }

    this.roles = roles;
    this.signatures.clear();
    this.verificationCache.clear();
    this.logger.info(`Initialized roles for ${this.gun} with ${rootKeys.length} root key(s)`);
  }

  getRole(name: RoleName): Role {
    const role = this.getBaseRole(name);
    return {
      ...role,
      paths: name === BaseRoles.Targets ? [''] : [],
      rootRole: { keyIds: Object.keys(role.keys), threshold: role.threshold },
    };
  }

  getBaseRole(name: RoleName): BaseRole {
    const entry = isTopLevelRole(name) ? this.roles.get(name) : undefined;
    if (!entry) {
      throw new NotFoundError('role', name);
    }
    return copyRole(entry.role);
  }

  isServerManaged(name: RoleName): boolean {
    return isTopLevelRole(name) && (this.roles.get(name)?.serverManaged ?? false);
  }

  listRoles(): RoleWithSignatures[] {
    return Array.from(this.roles.keys(), name => ({
      role: this.getRole(name),
      signatures: this.getSignatures(name),
    }));
  }

  /**
   * Replaces the keys of a top-level role (key rotation).
   * @throws InvalidRoleError when the threshold is out of bounds or the role cannot be server-managed
   */
  setRoleKeys(name: RoleName, keys: PublicKey[], threshold: number, serverManaged: boolean): void {
    if (!isTopLevelRole(name)) {
      throw new InvalidRoleError(name, 'only top-level roles have their keys rotated');
    }
    if (serverManaged && !isServerManageable(name)) {
      throw new InvalidRoleError(name, 'only snapshot and timestamp keys can be managed by the server');
    }
    const keyMap = keysOf(keys);
    assertThresholdBounds(name, Object.keys(keyMap).length, threshold);
    this.roles.set(name, { role: { name, keys: keyMap, threshold }, serverManaged });
    this.invalidateRole(name);
  }

  getSignatures(name: RoleName): Signature[] {
    return (this.signatures.get(name) ?? []).map(signature => ({ ...signature }));
  }

  setSignatures(name: RoleName, signatures: Signature[]): void {
    this.signatures.set(name, signatures.map(signature => ({ ...signature })));
  }

  deleteSignatures(name: RoleName): void {
    this.signatures.delete(name);
  }

  /**
   * Re-verifies each signature and returns copies with `isValid` set.
   * Signatures from keys outside the role are never valid.
   */
  checkSignatures(role: BaseRole, signatures: Signature[], payload: Uint8Array): Signature[] {
    const digest = sha256Hex(payload);
    const cache = this.verificationCache.get(role.name) ?? new Map<string, boolean>();
    this.verificationCache.set(role.name, cache);

    return signatures.map(signature => {
      const key = role.keys[signature.keyId];
      if (!key) {
        return { ...signature, isValid: false };
      }
      const cacheKey = `${digest}|${signature.keyId}|${signature.method}|${signature.signature}`;
      let isValid = cache.get(cacheKey);
      if (isValid === undefined) {
        isValid = this.crypto.verify(key, payload, signature);
        cache.set(cacheKey, isValid);
      }
      return { ...signature, isValid };
    });
  }

  countValidSignatures(role: BaseRole, signatures: Signature[], payload: Uint8Array): number {
    const validKeyIds = new Set(
      this.checkSignatures(role, signatures, payload)
        .filter(signature => signature.isValid)
        .map(signature => signature.keyId)
    );
    return validKeyIds.size;
  }

  verifyThreshold(role: BaseRole, signatures: Signature[], payload: Uint8Array): boolean {
    return this.countValidSignatures(role, signatures, payload) >= role.threshold;
  }

  invalidateRole(name: RoleName): void {
    if (this.verificationCache.delete(name)) {
      this.logger.debug(`Invalidated cached verifications for ${name}`);
    }
  }

  /**
   * Independent copy sharing only the collaborators.
   */
  clone(): RoleRegistry {
    const copy = new RoleRegistry({
      gun: this.gun,
      crypto: this.crypto,
      remote: this.remote,
      keyAlgorithm: this.keyAlgorithm,
      logger: this.logger,
    });
    copy.roles = new Map(Array.from(this.roles, ([name, entry]) => [name, { role: copyRole(entry.role), serverManaged: entry.serverManaged }]));
    copy.signatures = new Map(Array.from(this.signatures, ([name, signatures]) => [name, signatures.map(signature => ({ ...signature }))]));
    copy.verificationCache = new Map(Array.from(this.verificationCache, ([name, cache]) => [name, new Map(cache)]));
    return copy;
  }
}
