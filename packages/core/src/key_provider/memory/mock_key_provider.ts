/**
 * MockKeyProvider - In-memory KeyProvider for testing
 *
 * @module key_provider/memory/mock_key_provider
 */

import type { KeyProvider, StoredKey } from '../key_provider';

export interface MockKeyProviderOptions {
  /** Initial keys to populate */
  keys?: StoredKey[];
}

/**
 * In-memory KeyProvider. All operations use an internal Map, no I/O required.
 *
 * @example
 * ```typescript
 * const provider = new MockKeyProvider();
 * await provider.setPrivateKey({ ...privateKey, role: 'targets', gun: 'example.com/app' });
 * const key = await provider.getPrivateKey(privateKey.keyId);
 * ```
 */
export class MockKeyProvider implements KeyProvider {
  private readonly keys: Map<string, StoredKey>;

  constructor(options: MockKeyProviderOptions = {}) {
    this.keys = new Map((options.keys ?? []).map(key => [key.keyId, { ...key }]));
  }

  async getPrivateKey(keyId: string): Promise<StoredKey | null> {
    const key = this.keys.get(keyId);
    return key ? { ...key } : null;
  }

  /**
   * Overwrites an existing key with the same id.
   */
  async setPrivateKey(key: StoredKey): Promise<void> {
    this.keys.set(key.keyId, { ...key });
  }

  async hasPrivateKey(keyId: string): Promise<boolean> {
    return this.keys.has(keyId);
  }

  async deletePrivateKey(keyId: string): Promise<boolean> {
    return this.keys.delete(keyId);
  }

  async listKeyIds(): Promise<string[]> {
    return Array.from(this.keys.keys());
  }

  /**
   * Returns the number of stored keys (useful for testing).
   */
  size(): number {
    return this.keys.size;
  }

  clear(): void {
    this.keys.clear();
  }
}
