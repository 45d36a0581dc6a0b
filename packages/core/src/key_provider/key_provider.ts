/**
 * KeyProvider Interface
 *
 * Abstracts private key storage for the key custody layer. Backends:
 * filesystem (CLI and development) or memory (tests).
 *
 * @module key_provider
 */

import type { GUN, PrivateKey, RoleName } from '../trust_types';

/**
 * Error codes for KeyProvider operations.
 */
export type KeyProviderErrorCode =
  | 'KEY_READ_ERROR'
  | 'KEY_WRITE_ERROR'
  | 'KEY_DELETE_ERROR'
  | 'INVALID_KEY_FORMAT'
  | 'INVALID_KEY_ID';

/**
 * Error thrown when key storage fails.
 */
export class KeyProviderError extends Error {
  constructor(
    message: string,
    public readonly code: KeyProviderErrorCode,
    public readonly keyId?: string
  ) {
    super(message);
    this.name = 'KeyProviderError';
    Object.setPrototypeOf(this, KeyProviderError.prototype);
  }
}

/**
 * A private key together with the role and GUN it was created for.
 */
export type StoredKey = PrivateKey & {
  role: RoleName;
  gun: GUN;
};

/**
 * Interface for private key persistence, keyed by key id.
 *
 * @example
 * ```typescript
 * const provider = new FsKeyProvider({ keysDir: '.trustline/private' });
 * await provider.setPrivateKey(storedKey);
 * const key = await provider.getPrivateKey(storedKey.keyId);
 * ```
 */
export interface KeyProvider {
  /**
   * @returns The stored key, or null if not found
   */
  getPrivateKey(keyId: string): Promise<StoredKey | null>;

  /**
   * Stores a key under its keyId, replacing any previous entry.
   * @throws KeyProviderError if write fails
   */
  setPrivateKey(key: StoredKey): Promise<void>;

  hasPrivateKey(keyId: string): Promise<boolean>;

  /**
   * @returns true if key was deleted, false if it didn't exist
   */
  deletePrivateKey(keyId: string): Promise<boolean>;

  listKeyIds(): Promise<string[]>;
}
