import type { GUN, KeyAlgorithm, PrivateKey, PublicKey, RoleName, Signature } from '../trust_types';
import type { KeyProvider } from '../key_provider/key_provider';
import type { Logger } from '../logger';

/**
 * CryptoService - the Key Custody Interface
 *
 * The only component that touches private key bytes. The rest of the engine
 * asks it to create, look up, sign and verify by key id.
 */
export interface CryptoService {
  /**
   * Generates and stores a new key for a role of a GUN.
   */
  create(role: RoleName, gun: GUN, algorithm: KeyAlgorithm): Promise<PublicKey>;

  /**
   * Imports an existing private key.
   * @throws DetailedValidationError when the key id does not match the key material
   */
  addKey(role: RoleName, gun: GUN, privateKey: PrivateKey): Promise<void>;

  getKey(keyId: string): Promise<PublicKey | null>;

  /**
   * @throws NotFoundError when the key is not held
   */
  getPrivateKey(keyId: string): Promise<{ privateKey: PrivateKey; role: RoleName }>;

  /**
   * Removing an absent key is a no-op.
   */
  removeKey(keyId: string): Promise<void>;

  /**
   * Key ids held for a role; empty when there are none.
   */
  listKeys(role: RoleName): Promise<string[]>;

  /**
   * Every held key id mapped to its role.
   */
  listAllKeys(): Promise<Record<string, RoleName>>;

  /**
   * @throws NotFoundError when the key is not held
   */
  sign(keyId: string, payload: Uint8Array): Promise<Signature>;

  verify(publicKey: PublicKey, payload: Uint8Array, signature: Signature): boolean;
}

export interface KeyStoreCryptoServiceDependencies {
  keyProvider: KeyProvider;
  logger?: Logger;
}
