/**
 * FsKeyProvider - Filesystem-based KeyProvider implementation
 *
 * Stores each private key as JSON in {keysDir}/{keyId}.key with owner-only
 * permissions. Used by CLI and development environments.
 *
 * @module key_provider/fs/fs_key_provider
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { KeyProvider, StoredKey } from '../key_provider';
import { KeyProviderError } from '../key_provider';
import { SchemaValidationCache } from '../../trust_schemas';
import { formatAjvErrors } from '../../validation/common';

const KEY_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface FsKeyProviderOptions {
  /** Directory where key files are stored (e.g. .trustline/private) */
  keysDir: string;
  /** File extension for key files (default: '.key') */
  extension?: string;
  /** File permissions for key files (default: 0o600 - owner read/write only) */
  fileMode?: number;
}

/**
 * @example
 * ```typescript
 * const provider = new FsKeyProvider({ keysDir: '.trustline/private' });
 * await provider.setPrivateKey(storedKey);
 * const key = await provider.getPrivateKey(storedKey.keyId);
 * ```
 */
export class FsKeyProvider implements KeyProvider {
  private readonly keysDir: string;
  private readonly extension: string;
  private readonly fileMode: number;

  constructor(options: FsKeyProviderOptions) {
    this.keysDir = options.keysDir;
    this.extension = options.extension ?? '.key';
    this.fileMode = options.fileMode ?? 0o600;
  }

  async getPrivateKey(keyId: string): Promise<StoredKey | null> {
    const keyPath = this.getKeyPath(keyId);

    let content: string;
    try {
      content = await fs.readFile(keyPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new KeyProviderError(
        `Failed to read private key ${shortId(keyId)}: ${(error as Error).message}`,
        'KEY_READ_ERROR',
        keyId
      );
    }

    return this.parseKeyFile(keyId, content);
  }

  /**
   * Creates keysDir if missing, writes the key and restricts its permissions.
   */
  async setPrivateKey(key: StoredKey): Promise<void> {
    const keyPath = this.getKeyPath(key.keyId);

    try {
      await fs.mkdir(this.keysDir, { recursive: true });
      await fs.writeFile(keyPath, JSON.stringify(key, null, 2), { encoding: 'utf-8', mode: this.fileMode });
      // writeFile's mode only applies when the file is created
      await fs.chmod(keyPath, this.fileMode);
    } catch (error) {
      throw new KeyProviderError(
        `Failed to write private key ${shortId(key.keyId)}: ${(error as Error).message}`,
        'KEY_WRITE_ERROR',
        key.keyId
      );
    }
  }

  async hasPrivateKey(keyId: string): Promise<boolean> {
    try {
      await fs.access(this.getKeyPath(keyId));
      return true;
    } catch {
      return false;
    }
  }

  async deletePrivateKey(keyId: string): Promise<boolean> {
    const keyPath = this.getKeyPath(keyId);

    try {
      await fs.unlink(keyPath);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw new KeyProviderError(
        `Failed to delete private key ${shortId(keyId)}: ${(error as Error).message}`,
        'KEY_DELETE_ERROR',
        keyId
      );
    }
  }

  async listKeyIds(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.keysDir);
      return files
        .filter(file => file.endsWith(this.extension))
        .map(file => file.slice(0, -this.extension.length))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw new KeyProviderError(
        `Failed to list private keys in ${this.keysDir}: ${(error as Error).message}`,
        'KEY_READ_ERROR'
      );
    }
  }

  private parseKeyFile(keyId: string, content: string): StoredKey {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new KeyProviderError(`Private key file ${shortId(keyId)} is not valid JSON`, 'INVALID_KEY_FORMAT', keyId);
    }

    const validator = SchemaValidationCache.getValidator<StoredKey>('StoredKey');
    if (!validator(parsed)) {
      const details = formatAjvErrors(validator.errors).map(e => `${e.field}: ${e.message}`).join(', ');
      throw new KeyProviderError(`Private key file ${shortId(keyId)} is malformed: ${details}`, 'INVALID_KEY_FORMAT', keyId);
    }
    if (parsed.keyId !== keyId) {
      throw new KeyProviderError(`Private key file ${shortId(keyId)} holds key ${shortId(parsed.keyId)}`, 'INVALID_KEY_FORMAT', keyId);
    }
    return parsed;
  }

  /**
   * Key ids become file names; anything outside [A-Za-z0-9_-] is rejected
   * so an id can never escape keysDir.
   */
  private getKeyPath(keyId: string): string {
    if (!KEY_ID_PATTERN.test(keyId)) {
      throw new KeyProviderError(`Invalid key id: ${shortId(keyId)}`, 'INVALID_KEY_ID', keyId);
    }
    return path.join(this.keysDir, `${keyId}${this.extension}`);
  }
}

function shortId(keyId: string): string {
  return keyId.length > 12 ? `${keyId.substring(0, 12)}...` : keyId;
}
