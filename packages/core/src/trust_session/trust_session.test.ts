import { TrustSession } from './trust_session';
import type { TrustSessionDependencies } from './trust_session.types';
import { KeyStoreCryptoService } from '../crypto_service/crypto_service';
import { MockKeyProvider } from '../key_provider/memory/mock_key_provider';
import { createMemoryChangelist } from '../changelist/memory/memory_changelist';
import type { RecordChangelist } from '../changelist/record_changelist';
import { createChange } from '../changelist/change_factory';
import { encodeChangeContent } from '../validation/change_content_validator';
import { MemoryRemoteAuthority } from '../remote_authority/memory/memory_remote_authority';
import { EventBus } from '../event_bus/event_bus';
import type { PublicKey, RoleName, Target } from '../trust_types';
import {
  AlreadyInitializedError,
  DetailedValidationError,
  InvalidRoleError,
  InvalidRootKeysError,
  NotFoundError,
  NotInitializedError,
  PathConflictError,
  PathNotAuthorizedError,
  PublishCancelledError,
  PublishInProgressError,
  SessionFailedError,
  ThresholdNotMetError,
  TransportError,
  UnimplementedError,
  UnknownDelegationError,
} from '../trust_errors';

const GUN = 'example.com/app';

const IMAGE: Target = { name: 'img:v1', length: 1024, hashes: { sha256: 'deadbeef' } };
const RELEASE: Target = { name: 'releases/v1.tgz', length: 7, hashes: { sha256: 'abcdef01' } };

type Fixture = {
  crypto: KeyStoreCryptoService;
  changelist: RecordChangelist;
  eventBus: EventBus;
  session: TrustSession;
  rootKey: PublicKey;
};

async function setup(overrides: Partial<TrustSessionDependencies> = {}): Promise<Fixture> {
  const crypto = new KeyStoreCryptoService({ keyProvider: new MockKeyProvider() });
  const changelist = createMemoryChangelist();
  const eventBus = new EventBus();
  const session = new TrustSession({ gun: GUN, crypto, changelist, eventBus, ...overrides });
  const rootKey = await crypto.create('root', GUN, 'ed25519');
  return { crypto, changelist, eventBus, session, rootKey };
}

async function initialized(overrides: Partial<TrustSessionDependencies> = {}): Promise<Fixture> {
  const fixture = await setup(overrides);
  await fixture.session.initialize([fixture.rootKey.keyId]);
  return fixture;
}

function roleKeys(session: TrustSession, name: RoleName): string[] {
  const entry = session.listRoles().find(candidate => candidate.role.name === name);
  return entry ? Object.keys(entry.role.keys) : [];
}

function versionOf(session: TrustSession, name: RoleName): number | undefined {
  return session.getGeneration()?.metadata[name]?.payload.version;
}

describe('TrustSession', () => {
  describe('initialize', () => {
    it('should sign generation 1 for the four top-level roles', async () => {
      const { session } = await initialized();

      expect(session.getState()).toBe('initialized');
      expect(session.getGeneration()?.number).toBe(1);
      expect(Object.keys(session.getGeneration()?.metadata ?? {})).toEqual(['targets', 'root', 'snapshot', 'timestamp']);
      expect(session.listRoles().map(entry => entry.role.name)).toEqual(['root', 'targets', 'snapshot', 'timestamp']);
      expect(session.listRoles()[0]?.signatures.map(signature => signature.isValid)).toEqual([true]);
    });

    it('should reject a second initialize', async () => {
      const { session, rootKey } = await initialized();

      await expect(session.initialize([rootKey.keyId])).rejects.toThrow(AlreadyInitializedError);
    });

    it('should stay uninitialized when a root key is unknown', async () => {
      const { session } = await setup();

      await expect(session.initialize(['f'.repeat(64)])).rejects.toThrow(InvalidRootKeysError);
      expect(session.getState()).toBe('uninitialized');
      expect(session.getGeneration()).toBeNull();
    });

    it('should require a remote authority for server-managed roles', async () => {
      const { session, rootKey } = await setup();

      await expect(session.initialize([rootKey.keyId], ['timestamp'])).rejects.toThrow(UnimplementedError);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should push generation 1 and sign server-managed roles remotely', async () => {
      const remote = new MemoryRemoteAuthority();
      const { session, rootKey } = await setup({ remote });

      await session.initialize([rootKey.keyId], ['timestamp']);

      const timestampKey = await remote.getRoleKey(GUN, 'timestamp');
      expect(remote.getPublished(GUN)?.number).toBe(1);
      expect(roleKeys(session, 'timestamp')).toEqual([timestampKey.keyId]);
      expect(session.getGeneration()?.metadata['timestamp']?.signatures.map(signature => signature.keyId))
        .toEqual([timestampKey.keyId]);
    });
  });

  describe('staging', () => {
    it('should require an initialized session', async () => {
      const { session } = await setup();

      await expect(session.addTarget(IMAGE)).rejects.toThrow(NotInitializedError);
      await expect(session.getChangelist()).resolves.toEqual([]);
      expect(() => session.listTargets()).toThrow(NotInitializedError);
    });

    it('should reject an empty role list without changing state', async () => {
      const { session } = await initialized();

      await expect(session.addTarget(IMAGE, [])).rejects.toThrow(DetailedValidationError);
      await expect(session.removeTarget(IMAGE.name, [])).rejects.toThrow(DetailedValidationError);

      expect(session.getState()).toBe('initialized');
      expect(await session.getChangelist()).toEqual([]);
    });

    it('should keep every change when staging calls overlap', async () => {
      const { session } = await initialized();

      await Promise.all([session.addTarget(IMAGE), session.addTarget(RELEASE)]);

      expect((await session.getChangelist()).map(change => change.path)).toEqual(['img:v1', 'releases/v1.tgz']);
    });

    it('should record one create change per role', async () => {
      const { session } = await initialized();

      await session.addTarget(IMAGE, ['targets']);

      const changes = await session.getChangelist();
      expect(changes).toHaveLength(1);
      expect(changes[0]).toMatchObject({ action: 'create', scope: 'targets', type: 'target', path: 'img:v1' });
      expect(session.getState()).toBe('staging');
    });

    it('should reject a malformed target without staging it', async () => {
      const { session } = await initialized();

      await expect(session.addTarget({ name: 'x', length: -1, hashes: {} })).rejects.toThrow(DetailedValidationError);
      await expect(session.getChangelist()).resolves.toEqual([]);
    });

    it('should validate against pending delegations', async () => {
      const { session, crypto } = await initialized();
      const delegationKey = await crypto.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [delegationKey], ['releases/']);

      await session.addTarget(RELEASE, ['targets/releases']);
      await expect(session.addTarget(IMAGE, ['targets/releases']))
        .rejects.toThrow(new PathNotAuthorizedError('targets/releases', 'img:v1'));

      expect(await session.getChangelist()).toHaveLength(2);
      expect(session.getDelegationRoles()).toEqual([]);
      expect((await session.listDelegations(true)).map(role => role.name)).toEqual(['targets/releases']);
    });

    it('should reject removing an unknown delegation', async () => {
      const { session } = await initialized();

      await expect(session.removeDelegationRole('targets/missing')).rejects.toThrow(UnknownDelegationError);
      await expect(session.addDelegationPaths('targets/missing', ['a/'])).rejects.toThrow(UnknownDelegationError);
    });
  });

  describe('publish', () => {
    it('should publish a staged target signed by the targets key', async () => {
      const { session } = await initialized();
      await session.addTarget(IMAGE, ['targets']);

      const result = await session.publish();

      expect(result).toEqual({ generation: 2, changeCount: 1, touchedRoles: ['targets', 'snapshot', 'timestamp'] });
      expect(session.listTargets()).toEqual([{ target: IMAGE, role: 'targets' }]);
      await expect(session.getChangelist()).resolves.toEqual([]);
      expect(session.getState()).toBe('initialized');
      expect(versionOf(session, 'targets')).toBe(2);
      expect(versionOf(session, 'root')).toBe(1);
    });

    it('should not create a generation for an empty changelist', async () => {
      const { session } = await initialized();

      await expect(session.publish()).resolves.toEqual({ generation: null, changeCount: 0, touchedRoles: [] });
      expect(session.getGeneration()?.number).toBe(1);
    });

    it('should leave a target absent after add then remove', async () => {
      const { session } = await initialized();
      await session.addTarget(IMAGE);
      await session.removeTarget(IMAGE.name);

      await session.publish();

      expect(() => session.getTargetByName(IMAGE.name)).toThrow(NotFoundError);
    });

    it('should fail with ThresholdNotMetError when custody cannot reach the threshold', async () => {
      const { session, crypto } = await initialized();
      const keyA = await crypto.create('targets', GUN, 'ed25519');
      const keyB = await crypto.create('targets', GUN, 'ed25519');
      await session.rotateKey('targets', false, [keyA.keyId, keyB.keyId], 2);
      await session.addTarget(IMAGE);
      await crypto.removeKey(keyB.keyId);

      const failure = session.publish();

      await expect(failure).rejects.toThrow(ThresholdNotMetError);
      await expect(failure).rejects.toMatchObject({ role: 'targets', threshold: 2, validSignatures: 1 });
      expect(session.listTargets()).toEqual([]);
      expect(await session.getChangelist()).toHaveLength(2);
      expect(session.getState()).toBe('staging');
      expect(session.getGeneration()?.number).toBe(1);
    });

    it('should publish when every key of a threshold-2 role is held', async () => {
      const { session, crypto } = await initialized();
      const keyA = await crypto.create('targets', GUN, 'ed25519');
      const keyB = await crypto.create('targets', GUN, 'ed25519');
      await session.rotateKey('targets', false, [keyA.keyId, keyB.keyId], 2);
      await session.addTarget(IMAGE);

      await session.publish();

      expect(roleKeys(session, 'targets')).toEqual([keyA.keyId, keyB.keyId]);
      expect(session.getGeneration()?.metadata['targets']?.signatures).toHaveLength(2);
    });

    it('should apply nothing when one change in the changelist conflicts', async () => {
      const { session, crypto, changelist } = await initialized();
      const delegationKey = await crypto.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [delegationKey], ['releases/']);
      await session.publish();
      await session.addTarget(IMAGE);
      await changelist.add(createChange('create', 'targets/releases/nightly', 'delegation', '', encodeChangeContent({
        addKeys: [delegationKey],
        removeKeys: [],
        addPaths: ['nightly/'],
        removePaths: [],
        clearAllPaths: false,
      })));
      const staged = await session.getChangelist();

      await expect(session.publish()).rejects.toThrow(PathConflictError);

      expect(session.listTargets()).toEqual([]);
      expect(session.getDelegationRoles().map(role => role.name)).toEqual(['targets/releases']);
      expect(await session.getChangelist()).toEqual(staged);
      expect(session.getGeneration()?.number).toBe(2);
    });

    it('should sign delegated targets with the delegation key', async () => {
      const { session, crypto } = await initialized();
      const delegationKey = await crypto.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [delegationKey], ['releases/']);
      await session.addTarget(RELEASE, ['targets/releases']);

      const result = await session.publish();

      expect(result.touchedRoles).toEqual(['targets', 'targets/releases', 'snapshot', 'timestamp']);
      const all = session.getAllTargetMetadataByName(RELEASE.name);
      expect(all).toHaveLength(1);
      expect(all[0]?.role).toEqual({ name: 'targets/releases', keys: { [delegationKey.keyId]: delegationKey }, threshold: 1, paths: ['releases/'] });
      expect(all[0]?.signatures.map(signature => [signature.keyId, signature.isValid])).toEqual([[delegationKey.keyId, true]]);
    });

    it('should not sign for a delegation whose key is held elsewhere', async () => {
      const { session } = await initialized();
      const elsewhere = new KeyStoreCryptoService({ keyProvider: new MockKeyProvider() });
      const foreignKey = await elsewhere.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [foreignKey], ['releases/']);
      await session.addTarget(RELEASE, ['targets/releases']);

      await expect(session.publish()).rejects.toMatchObject({ role: 'targets/releases', threshold: 1, validSignatures: 0 });
    });

    it('should remove a delegation together with its targets', async () => {
      const { session, crypto } = await initialized();
      const delegationKey = await crypto.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [delegationKey], ['releases/']);
      await session.addTarget(RELEASE, ['targets/releases']);
      await session.publish();

      await session.removeDelegationRole('targets/releases');
      await session.publish();

      expect(session.listTargets()).toEqual([]);
      expect(session.getDelegationRoles()).toEqual([]);
      expect(session.getGeneration()?.metadata['targets/releases']).toBeUndefined();
    });

    it('should list delegations after roles once published', async () => {
      const { session, crypto } = await initialized();
      const delegationKey = await crypto.create('targets/releases', GUN, 'ed25519');
      await session.addDelegation('targets/releases', [delegationKey], ['releases/']);
      await session.publish();

      const roles = session.listRoles();

      expect(session.getDelegationRoles()).not.toEqual([]);
      expect(roles.map(entry => entry.role.name)).toEqual(['root', 'targets', 'snapshot', 'timestamp', 'targets/releases']);
      expect(roles[4]?.role.rootRole).toEqual({ keyIds: [delegationKey.keyId], threshold: 1 });
    });

    it('should reject a second publish while one is running', async () => {
      const { session } = await initialized();
      await session.addTarget(IMAGE);

      const first = session.publish();
      expect(session.getState()).toBe('publishing');

      await expect(session.publish()).rejects.toThrow(PublishInProgressError);
      await expect(session.addTarget(RELEASE)).rejects.toThrow(PublishInProgressError);
      await first;
      expect(session.listTargets()).toEqual([{ target: IMAGE, role: 'targets' }]);
    });

    it('should publish a change whose staging started before the publish', async () => {
      const { session } = await initialized();
      await session.addTarget(IMAGE);

      const staging = session.addTarget(RELEASE);
      const publishing = session.publish();
      expect(session.getState()).toBe('publishing');
      await staging;
      const result = await publishing;

      expect(result.changeCount).toBe(2);
      expect(session.listTargets().map(entry => entry.target.name).sort()).toEqual(['img:v1', 'releases/v1.tgz']);
      expect(await session.getChangelist()).toEqual([]);
      expect(session.getState()).toBe('initialized');
    });

    it('should reject staging while trust data is being deleted', async () => {
      const { session } = await initialized();

      const deleting = session.deleteTrustData(false);
      await expect(session.addTarget(IMAGE)).rejects.toThrow(PublishInProgressError);
      await deleting;

      expect(await session.getChangelist()).toEqual([]);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should cancel before signing without side effects', async () => {
      const { session } = await initialized();
      await session.addTarget(IMAGE);
      const controller = new AbortController();
      controller.abort();

      await expect(session.publish({ signal: controller.signal })).rejects.toThrow(PublishCancelledError);

      expect(await session.getChangelist()).toHaveLength(1);
      expect(session.getGeneration()?.number).toBe(1);
      expect(session.getState()).toBe('staging');
    });

    it('should pass remote failures through and keep the committed state', async () => {
      const remote = new MemoryRemoteAuthority();
      const { session } = await initialized({ remote });
      const failure = new TransportError('unreachable');
      jest.spyOn(remote, 'publish').mockRejectedValueOnce(failure);
      await session.addTarget(IMAGE);

      await expect(session.publish()).rejects.toBe(failure);

      expect(session.listTargets()).toEqual([]);
      expect(remote.getPublished(GUN)?.number).toBe(1);
      expect(session.getState()).toBe('staging');
    });

    it('should fail the session when the changelist cannot be cleared after commit', async () => {
      const { session, changelist } = await initialized();
      await session.addTarget(IMAGE);
      jest.spyOn(changelist, 'clear').mockRejectedValueOnce(new Error('disk full'));

      await expect(session.publish()).rejects.toThrow('disk full');

      expect(session.getState()).toBe('failed');
      expect(session.listTargets()).toEqual([{ target: IMAGE, role: 'targets' }]);
      await expect(session.addTarget(RELEASE)).rejects.toThrow(SessionFailedError);

      await session.deleteTrustData(false);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should emit publish events', async () => {
      const { session, eventBus } = await initialized();
      const handler = jest.fn();
      eventBus.subscribe('trust.publish.succeeded', handler);
      await session.addTarget(IMAGE);

      await session.publish();
      await eventBus.waitForIdle();

      expect(handler).toHaveBeenCalledWith(expect.objectContaining({
        payload: { gun: GUN, generation: 2, touchedRoles: ['targets', 'snapshot', 'timestamp'] },
      }));
    });
  });

  describe('witness', () => {
    it('should re-sign existing roles and skip unknown ones', async () => {
      const { session } = await initialized();

      await expect(session.witness(['targets', 'targets/missing', 'snapshot'])).resolves.toEqual(['targets', 'snapshot']);
      await session.publish();

      expect(versionOf(session, 'targets')).toBe(2);
      expect(versionOf(session, 'snapshot')).toBe(2);
      expect(versionOf(session, 'root')).toBe(1);
    });
  });

  describe('rotateKey', () => {
    it('should rotate to a fresh custody key when no keys are listed', async () => {
      const { session, crypto } = await initialized();
      const before = roleKeys(session, 'targets');

      await session.rotateKey('targets', false);
      const result = await session.publish();

      const after = roleKeys(session, 'targets');
      expect(after).toHaveLength(1);
      expect(after).not.toEqual(before);
      expect(await crypto.getKey(after[0] ?? '')).not.toBeNull();
      expect(result.touchedRoles).toEqual(['targets', 'root', 'snapshot', 'timestamp']);
    });

    it('should reject invalid rotations without staging', async () => {
      const { session, crypto } = await initialized();
      const keyA = await crypto.create('targets', GUN, 'ed25519');

      await expect(session.rotateKey('targets/releases', false)).rejects.toThrow(InvalidRoleError);
      await expect(session.rotateKey('targets', false, ['f'.repeat(64)])).rejects.toThrow(NotFoundError);
      await expect(session.rotateKey('targets', false, [keyA.keyId], 2)).rejects.toThrow(InvalidRoleError);
      await expect(session.rotateKey('targets', true)).rejects.toThrow(InvalidRoleError);
      await expect(session.rotateKey('snapshot', true)).rejects.toThrow(UnimplementedError);
      await expect(session.getChangelist()).resolves.toEqual([]);
    });

    it('should sign a root rotation with both old and new root keys', async () => {
      const { session, crypto, rootKey } = await initialized();
      const newRoot = await crypto.create('root', GUN, 'ed25519');

      await session.rotateKey('root', false, [newRoot.keyId]);
      await session.publish();

      expect(roleKeys(session, 'root')).toEqual([newRoot.keyId]);
      expect(session.getGeneration()?.metadata['root']?.signatures.map(signature => [signature.keyId, signature.isValid]))
        .toEqual([[rootKey.keyId, true], [newRoot.keyId, true]]);
    });

    it('should require the old root threshold on rotation', async () => {
      const { session, crypto, rootKey } = await initialized();
      const newRoot = await crypto.create('root', GUN, 'ed25519');
      await session.rotateKey('root', false, [newRoot.keyId]);
      await crypto.removeKey(rootKey.keyId);

      await expect(session.publish()).rejects.toMatchObject({ role: 'root', threshold: 1, validSignatures: 0 });
      expect(roleKeys(session, 'root')).toEqual([rootKey.keyId]);
    });

    it('should rotate a server-managed key through the remote authority', async () => {
      const remote = new MemoryRemoteAuthority();
      const { session, rootKey } = await setup({ remote });
      await session.initialize([rootKey.keyId], ['timestamp']);
      const oldKey = await remote.getRoleKey(GUN, 'timestamp');

      await session.rotateKey('timestamp', true);
      await session.publish();

      const newKey = await remote.getRoleKey(GUN, 'timestamp');
      expect(newKey.keyId).not.toBe(oldKey.keyId);
      expect(roleKeys(session, 'timestamp')).toEqual([newKey.keyId]);
      expect(remote.getPublished(GUN)?.number).toBe(2);
    });
  });

  describe('deleteTrustData', () => {
    it('should wipe local state and keep keys', async () => {
      const { session, crypto, rootKey } = await initialized();
      await session.addTarget(IMAGE);

      await session.deleteTrustData(false);

      expect(session.getState()).toBe('uninitialized');
      expect(session.getGeneration()).toBeNull();
      await expect(session.getChangelist()).resolves.toEqual([]);
      expect(await crypto.listKeys('root')).toEqual([rootKey.keyId]);
    });

    it('should refuse remote deletion without a remote authority', async () => {
      const { session } = await initialized();

      await expect(session.deleteTrustData(true)).rejects.toThrow(UnimplementedError);
      expect(session.getState()).toBe('initialized');
    });

    it('should leave local state intact when remote deletion fails', async () => {
      const remote = new MemoryRemoteAuthority();
      const { session } = await initialized({ remote });
      jest.spyOn(remote, 'deleteTrustData').mockRejectedValueOnce(new TransportError('unreachable'));

      await expect(session.deleteTrustData(true)).rejects.toThrow(TransportError);
      expect(session.getGeneration()?.number).toBe(1);
    });

    it('should delete remote data first', async () => {
      const remote = new MemoryRemoteAuthority();
      const { session } = await initialized({ remote });

      await session.deleteTrustData(true);

      expect(remote.getPublished(GUN)).toBeNull();
      expect(session.getState()).toBe('uninitialized');
    });
  });
});
