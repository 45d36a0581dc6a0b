import {
  changelistFromSnapshot,
  fromWireChange,
  fromWireDelegationRole,
  fromWirePublicKey,
  fromWireRole,
  fromWireSignature,
  fromWireTarget,
  toWireChange,
  toWireDelegationRole,
  toWireTarget,
} from './converters';
import { generateKeys, toPublicKey } from '../crypto/keys';
import { createChange } from '../changelist/change_factory';
import { encodeChangeContent } from '../validation/change_content_validator';
import type { PublicKey } from '../trust_types';
import { DetailedValidationError } from '../trust_errors';

describe('transport converters', () => {
  let key: PublicKey;

  beforeAll(async () => {
    key = toPublicKey(await generateKeys('ed25519'));
  });

  describe('targets', () => {
    it('should convert base64 wire digests to hex', () => {
      const target = fromWireTarget({ gun: 'example.com/app', name: 'img:v1', length: 3, hashes: { sha256: '3q2+7w==' } });

      expect(target).toEqual({ name: 'img:v1', length: 3, hashes: { sha256: 'deadbeef' } });
    });

    it('should convert hex digests back to base64', () => {
      expect(toWireTarget({ name: 'img:v1', length: 3, hashes: { sha256: 'deadbeef' } }, 'example.com/app')).toEqual({
        gun: 'example.com/app',
        name: 'img:v1',
        length: 3,
        hashes: { sha256: '3q2+7w==' },
      });
    });

    it('should reject a negative length', () => {
      expect(() => fromWireTarget({ name: 'a', length: -1, hashes: { sha256: '3q2+7w==' } })).toThrow(DetailedValidationError);
    });
  });

  describe('signatures', () => {
    it('should drop the wire validity flag', () => {
      const signature = fromWireSignature({ keyID: 'a'.repeat(64), method: 'ed25519', signature: 'AAAA', isValid: true });

      expect(signature).toEqual({ keyId: 'a'.repeat(64), method: 'ed25519', signature: 'AAAA', isValid: false });
    });

    it('should reject unknown methods', () => {
      expect(() => fromWireSignature({ keyID: 'a'.repeat(64), method: 'dsa', signature: 'AAAA' })).toThrow(DetailedValidationError);
    });
  });

  describe('keys and roles', () => {
    it('should derive key ids from key material', () => {
      expect(fromWirePublicKey({ algorithm: 'ed25519', public: key.public })).toEqual(key);
      expect(() => fromWirePublicKey({ id: 'b'.repeat(64), algorithm: 'ed25519', public: key.public }))
        .toThrow(DetailedValidationError);
    });

    it('should round-trip a delegation role', () => {
      const role = { name: 'targets/releases', keys: { [key.keyId]: key }, threshold: 1, paths: ['releases/'] };

      expect(fromWireDelegationRole(toWireDelegationRole(role))).toEqual(role);
    });

    it('should build a role from its key-id view', () => {
      const role = fromWireRole({ name: 'root', rootRole: { keyIDs: [key.keyId], threshold: 1 } });

      expect(role).toEqual({ name: 'root', keys: {}, threshold: 1, paths: [], rootRole: { keyIds: [key.keyId], threshold: 1 } });
    });
  });

  describe('changes', () => {
    it('should decode base64 content into a frozen change', () => {
      const content = encodeChangeContent({ length: 1, hashes: { sha256: 'ab' } });
      const wire = toWireChange(createChange('create', 'targets', 'target', 'a', content));

      const change = fromWireChange(wire);

      expect(Object.isFrozen(change)).toBe(true);
      expect(Buffer.from(change.content).toString('utf8')).toBe('{"length":1,"hashes":{"sha256":"ab"}}');
    });

    it('should reject unknown actions', () => {
      expect(() => fromWireChange({ action: 'upsert', scope: 'targets', type: 'target' })).toThrow(DetailedValidationError);
    });

    it('should rebuild a changelist in the reported order', async () => {
      const changelist = await changelistFromSnapshot([
        { action: 'create', scope: 'targets', type: 'target', path: 'b', content: '' },
        { action: 'delete', scope: 'targets', type: 'target', path: 'a' },
      ]);

      const changes = await changelist.list();
      expect(changes.map(change => [change.action, change.path])).toEqual([['create', 'b'], ['delete', 'a']]);
      expect(changelist.location()).toBe('remote');
    });
  });
});
