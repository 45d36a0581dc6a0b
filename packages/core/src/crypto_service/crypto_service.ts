import type { GUN, KeyAlgorithm, PrivateKey, PublicKey, RoleName, Signature } from '../trust_types';
import type { KeyProvider, StoredKey } from '../key_provider/key_provider';
import type { Logger } from '../logger';
import type { CryptoService, KeyStoreCryptoServiceDependencies } from './crypto_service.types';
import { computeKeyId, generateKeys, toPublicKey } from '../crypto/keys';
import { signBytes, verifyBytes } from '../crypto/signatures';
import { DetailedValidationError, NotFoundError } from '../trust_errors';
import { createLogger } from '../logger';

function toPrivateKey(stored: StoredKey): PrivateKey {
  return {
    algorithm: stored.algorithm,
    keyId: stored.keyId,
    public: stored.public,
    private: stored.private,
  };
}

/**
 * CryptoService backed by a KeyProvider (filesystem or memory).
 *
 * @example
 * ```typescript
 * const crypto = new KeyStoreCryptoService({ keyProvider: new MockKeyProvider() });
 * const key = await crypto.create('targets', 'example.com/app', 'ed25519');
 * const signature = await crypto.sign(key.keyId, payload);
 * ```
 */
export class KeyStoreCryptoService implements CryptoService {
  private readonly keyProvider: KeyProvider;
  private readonly logger: Logger;

  constructor(dependencies: KeyStoreCryptoServiceDependencies) {
    this.keyProvider = dependencies.keyProvider;
    this.logger = dependencies.logger ?? createLogger('[CryptoService] ');
  }

  async create(role: RoleName, gun: GUN, algorithm: KeyAlgorithm): Promise<PublicKey> {
    const privateKey = await generateKeys(algorithm);
    await this.keyProvider.setPrivateKey({ ...privateKey, role, gun });
    this.logger.info(`Created ${algorithm} key ${privateKey.keyId} for ${gun}:${role}`);
    return toPublicKey(privateKey);
  }

  async addKey(role: RoleName, gun: GUN, privateKey: PrivateKey): Promise<void> {
    const expected = computeKeyId(privateKey.algorithm, privateKey.public);
    if (expected !== privateKey.keyId) {
      throw new DetailedValidationError('PrivateKey', [
        { field: 'keyId', message: `does not match key material (expected ${expected})`, value: privateKey.keyId },
      ]);
    }
    await this.keyProvider.setPrivateKey({ ...privateKey, role, gun });
    this.logger.info(`Imported ${privateKey.algorithm} key ${privateKey.keyId} for ${gun}:${role}`);
  }

  async getKey(keyId: string): Promise<PublicKey | null> {
    const stored = await this.keyProvider.getPrivateKey(keyId);
    return stored ? toPublicKey(toPrivateKey(stored)) : null;
  }

  async getPrivateKey(keyId: string): Promise<{ privateKey: PrivateKey; role: RoleName }> {
    const stored = await this.keyProvider.getPrivateKey(keyId);
    if (!stored) {
      throw new NotFoundError('key', keyId);
    }
    return { privateKey: toPrivateKey(stored), role: stored.role };
  }

  async removeKey(keyId: string): Promise<void> {
    const removed = await this.keyProvider.deletePrivateKey(keyId);
    if (removed) {
      this.logger.info(`Removed key ${keyId}`);
    }
  }

  async listKeys(role: RoleName): Promise<string[]> {
    const all = await this.listAllKeys();
    return Object.keys(all).filter(keyId => all[keyId] === role);
  }

  async listAllKeys(): Promise<Record<string, RoleName>> {
    const keyIds = await this.keyProvider.listKeyIds();
    const result: Record<string, RoleName> = {};
    for (const keyId of keyIds) {
      const stored = await this.keyProvider.getPrivateKey(keyId);
      if (stored) {
        result[keyId] = stored.role;
      }
    }
    return result;
  }

  async sign(keyId: string, payload: Uint8Array): Promise<Signature> {
    const { privateKey } = await this.getPrivateKey(keyId);
    return signBytes(privateKey, payload);
  }

  verify(publicKey: PublicKey, payload: Uint8Array, signature: Signature): boolean {
    return verifyBytes(publicKey, payload, signature);
  }
}
