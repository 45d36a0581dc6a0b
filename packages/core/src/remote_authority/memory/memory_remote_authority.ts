import type { GUN, KeyAlgorithm, PublicKey, RoleName, Signature } from '../../trust_types';
import { SERVER_MANAGEABLE_ROLES } from '../../trust_types';
import type { Generation } from '../../signed_metadata/signed_metadata.types';
import type { RemoteAuthority } from '../remote_authority';
import { KeyStoreCryptoService } from '../../crypto_service/crypto_service';
import { MockKeyProvider } from '../../key_provider/memory/mock_key_provider';
import { InvalidRoleError, TransportError } from '../../trust_errors';

export interface MemoryRemoteAuthorityOptions {
  /** Algorithm for server-managed keys (default: ed25519) */
  keyAlgorithm?: KeyAlgorithm;
}

/**
 * In-process RemoteAuthority for tests and local development.
 *
 * @example
 * ```typescript
 * const remote = new MemoryRemoteAuthority();
 * const session = createMemoryTrustSession({ gun, remote });
 * await session.initialize([rootKeyId], ['timestamp']);
 * expect(remote.getPublished(gun)?.number).toBe(1);
 * ```
 */
export class MemoryRemoteAuthority implements RemoteAuthority {
  private readonly custody = new KeyStoreCryptoService({ keyProvider: new MockKeyProvider() });
  private readonly keyAlgorithm: KeyAlgorithm;
  private readonly roleKeys = new Map<string, PublicKey[]>();
  private readonly published = new Map<GUN, Generation>();

  constructor(options: MemoryRemoteAuthorityOptions = {}) {
    this.keyAlgorithm = options.keyAlgorithm ?? 'ed25519';
  }

  async getRoleKey(gun: GUN, role: RoleName): Promise<PublicKey> {
    const keys = this.roleKeys.get(slot(gun, role)) ?? [];
    const current = keys[keys.length - 1];
    return current ?? this.rotateRoleKey(gun, role);
  }

  async rotateRoleKey(gun: GUN, role: RoleName): Promise<PublicKey> {
    assertManageable(role);
    const key = await this.custody.create(role, gun, this.keyAlgorithm);
    const keys = this.roleKeys.get(slot(gun, role)) ?? [];
    this.roleKeys.set(slot(gun, role), [...keys, key]);
    return key;
  }

  async sign(gun: GUN, role: RoleName, keyIds: string[], payload: Uint8Array): Promise<Signature[]> {
    assertManageable(role);
    const held = new Set((this.roleKeys.get(slot(gun, role)) ?? []).map(key => key.keyId));
    const signatures: Signature[] = [];
    for (const keyId of keyIds) {
      if (held.has(keyId)) {
        signatures.push(await this.custody.sign(keyId, payload));
      }
    }
    return signatures;
  }

  /**
   * Rejects generations that do not advance the last published one.
   */
  async publish(generation: Generation): Promise<void> {
    const previous = this.published.get(generation.gun);
    if (previous && generation.number <= previous.number) {
      throw new TransportError(
        `Generation ${generation.number} for ${generation.gun} does not advance published generation ${previous.number}`
      );
    }
    this.published.set(generation.gun, structuredClone(generation));
  }

  async deleteTrustData(gun: GUN): Promise<void> {
    this.published.delete(gun);
  }

  // ==================== Test Helper Methods ====================

  getPublished(gun: GUN): Generation | null {
    return this.published.get(gun) ?? null;
  }
}

function slot(gun: GUN, role: RoleName): string {
  return `${gun}\u0000${role}`;
}

function assertManageable(role: RoleName): void {
  if (!SERVER_MANAGEABLE_ROLES.some(candidate => candidate === role)) {
    throw new InvalidRoleError(role, 'only snapshot and timestamp keys can be managed by the server');
  }
}
