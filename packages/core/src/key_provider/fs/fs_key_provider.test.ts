import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsKeyProvider } from './fs_key_provider';
import { KeyProviderError } from '../key_provider';
import type { StoredKey } from '../key_provider';
import { generateKeys } from '../../crypto/keys';

describe('FsKeyProvider', () => {
  let tempDir: string;
  let keysDir: string;
  let provider: FsKeyProvider;
  let storedKey: StoredKey;

  beforeAll(async () => {
    const privateKey = await generateKeys('ed25519');
    storedKey = { ...privateKey, role: 'targets', gun: 'example.com/app' };
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-key-provider-test-'));
    keysDir = path.join(tempDir, 'private');
    provider = new FsKeyProvider({ keysDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('KeyProvider interface', () => {
    it('should return the stored key by id', async () => {
      await provider.setPrivateKey(storedKey);

      expect(await provider.getPrivateKey(storedKey.keyId)).toEqual(storedKey);
    });

    it('should return null for an unknown key id', async () => {
      expect(await provider.getPrivateKey('0'.repeat(64))).toBeNull();
    });

    it('should persist keys across provider instances', async () => {
      await provider.setPrivateKey(storedKey);

      const reopened = new FsKeyProvider({ keysDir });

      expect(await reopened.getPrivateKey(storedKey.keyId)).toEqual(storedKey);
      expect(await reopened.listKeyIds()).toEqual([storedKey.keyId]);
    });

    it('should delete a key and report whether it existed', async () => {
      await provider.setPrivateKey(storedKey);

      expect(await provider.deletePrivateKey(storedKey.keyId)).toBe(true);
      expect(await provider.deletePrivateKey(storedKey.keyId)).toBe(false);
      expect(await provider.hasPrivateKey(storedKey.keyId)).toBe(false);
    });

    it('should list no keys when the directory does not exist', async () => {
      expect(await provider.listKeyIds()).toEqual([]);
    });
  });

  describe('filesystem specifics', () => {
    it('should write {keysDir}/{keyId}.key with owner-only permissions', async () => {
      await provider.setPrivateKey(storedKey);

      const keyPath = path.join(keysDir, `${storedKey.keyId}.key`);
      const stats = await fs.stat(keyPath);

      expect(stats.mode & 0o777).toBe(0o600);
      expect(JSON.parse(await fs.readFile(keyPath, 'utf-8'))).toEqual(storedKey);
    });

    it('should reject key ids that could escape the keys directory', async () => {
      await expect(provider.getPrivateKey('../../etc/passwd')).rejects.toMatchObject({ code: 'INVALID_KEY_ID' });
      await expect(provider.setPrivateKey({ ...storedKey, keyId: '../escape' })).rejects.toThrow(KeyProviderError);
    });

    it('should reject a key file that is not valid JSON', async () => {
      await fs.mkdir(keysDir, { recursive: true });
      await fs.writeFile(path.join(keysDir, `${storedKey.keyId}.key`), 'not json');

      await expect(provider.getPrivateKey(storedKey.keyId)).rejects.toMatchObject({ code: 'INVALID_KEY_FORMAT' });
    });

    it('should reject a key file that holds a different key id', async () => {
      const otherId = 'a'.repeat(64);
      await fs.mkdir(keysDir, { recursive: true });
      await fs.writeFile(path.join(keysDir, `${otherId}.key`), JSON.stringify(storedKey));

      await expect(provider.getPrivateKey(otherId)).rejects.toMatchObject({ code: 'INVALID_KEY_FORMAT' });
    });

    it('should use a custom file extension', async () => {
      const customProvider = new FsKeyProvider({ keysDir, extension: '.privkey' });

      await customProvider.setPrivateKey(storedKey);

      expect(await fs.readdir(keysDir)).toEqual([`${storedKey.keyId}.privkey`]);
      expect(await customProvider.listKeyIds()).toEqual([storedKey.keyId]);
    });
  });
});
