import { DelegationResolver, isDelegationName, parentOf } from './delegation_resolver';
import type { TargetsRoleSource } from './delegation_resolver.types';
import type { BaseRole, DelegationEdit, PublicKey } from '../trust_types';
import { InvalidRoleError, PathConflictError, UnknownDelegationError } from '../trust_errors';

function key(keyId: string): PublicKey {
  return { algorithm: 'ed25519', keyId, public: 'AAAA' };
}

function edit(overrides: Partial<DelegationEdit> = {}): DelegationEdit {
  return { addKeys: [], removeKeys: [], addPaths: [], removePaths: [], clearAllPaths: false, ...overrides };
}

const targetsRole: BaseRole = { name: 'targets', keys: { t1: key('t1') }, threshold: 1 };
const roles: TargetsRoleSource = { getBaseRole: () => targetsRole };

describe('DelegationResolver', () => {
  let resolver: DelegationResolver;

  beforeEach(() => {
    resolver = new DelegationResolver({ roles });
  });

  describe('names', () => {
    it('should recognise delegation names', () => {
      expect(isDelegationName('targets/releases')).toBe(true);
      expect(isDelegationName('targets/a/b')).toBe(true);
      expect(isDelegationName('targets')).toBe(false);
      expect(isDelegationName('targets/')).toBe(false);
      expect(isDelegationName('root/a')).toBe(false);
      expect(parentOf('targets/a/b')).toBe('targets/a');
    });
  });

  describe('applyDelegationChange', () => {
    it('should create a delegation with keys, paths and threshold', () => {
      const result = resolver.applyDelegationChange('create', 'targets/releases', edit({
        addKeys: [key('k1'), key('k2')],
        addPaths: ['releases/', 'releases/'],
        newThreshold: 2,
      }));

      expect(result.delegation).toEqual({
        name: 'targets/releases',
        keys: { k1: key('k1'), k2: key('k2') },
        threshold: 2,
        paths: ['releases/'],
      });
      expect(resolver.has('targets/releases')).toBe(true);
    });

    it('should default a new delegation to threshold 1', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')] }));

      expect(resolver.get('targets/a').threshold).toBe(1);
    });

    it('should reject names outside the targets tree', () => {
      expect(() => resolver.applyDelegationChange('create', 'targets', edit({ addKeys: [key('k1')] })))
        .toThrow(InvalidRoleError);
      expect(() => resolver.applyDelegationChange('create', 'snapshot/a', edit({ addKeys: [key('k1')] })))
        .toThrow(InvalidRoleError);
    });

    it('should reject a delegation without keys', () => {
      expect(() => resolver.applyDelegationChange('create', 'targets/a', edit({ addPaths: ['a/'] })))
        .toThrow(InvalidRoleError);
      expect(resolver.has('targets/a')).toBe(false);
    });

    it('should reject a threshold above the key count', () => {
      expect(() => resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], newThreshold: 2 })))
        .toThrow(InvalidRoleError);
    });

    it('should require the parent to exist', () => {
      expect(() => resolver.applyDelegationChange('create', 'targets/a/b', edit({ addKeys: [key('k1')] })))
        .toThrow(new UnknownDelegationError('targets/a'));
    });

    it('should require the delegation to exist for updates', () => {
      expect(() => resolver.applyDelegationChange('update', 'targets/a', edit({ addPaths: ['a/'] })))
        .toThrow(UnknownDelegationError);
    });

    it('should reject child paths outside the parent paths', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: ['a/'] }));

      let thrown: unknown;
      try {
        resolver.applyDelegationChange('create', 'targets/a/b', edit({ addKeys: [key('k2')], addPaths: ['a/b/', 'c/'] }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(PathConflictError);
      expect(thrown).toMatchObject({ role: 'targets/a/b', parent: 'targets/a', paths: ['c/'] });
      expect(resolver.has('targets/a/b')).toBe(false);
    });

    it('should reject a literal child path that reaches past a glob parent path', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: ['releases/*'] }));

      expect(() => resolver.applyDelegationChange('create', 'targets/a/b', edit({ addKeys: [key('k2')], addPaths: ['releases/x'] })))
        .toThrow(PathConflictError);
      expect(resolver.has('targets/a/b')).toBe(false);
    });

    it('should apply removals before additions and clear paths first', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1'), key('k2')], addPaths: ['a/', 'b/'] }));

      resolver.applyDelegationChange('update', 'targets/a', edit({ clearAllPaths: true, addPaths: ['c/'], removeKeys: ['k2'] }));

      expect(resolver.get('targets/a')).toEqual({ name: 'targets/a', keys: { k1: key('k1') }, threshold: 1, paths: ['c/'] });
    });

    it('should reject removing keys below the threshold', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1'), key('k2')], newThreshold: 2 }));

      expect(() => resolver.applyDelegationChange('update', 'targets/a', edit({ removeKeys: ['k2'] })))
        .toThrow(InvalidRoleError);
      expect(resolver.get('targets/a').threshold).toBe(2);
    });

    it('should merge a create into an existing delegation', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: ['a/'] }));
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k2')], addPaths: ['b/'] }));

      expect(resolver.get('targets/a').paths).toEqual(['a/', 'b/']);
      expect(Object.keys(resolver.get('targets/a').keys)).toEqual(['k1', 'k2']);
    });

    it('should remove a delegation and its descendants', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: [''] }));
      resolver.applyDelegationChange('create', 'targets/a/b', edit({ addKeys: [key('k1')], addPaths: ['x/'] }));
      resolver.applyDelegationChange('create', 'targets/ab', edit({ addKeys: [key('k1')], addPaths: ['y/'] }));

      const result = resolver.applyDelegationChange('delete', 'targets/a', edit());

      expect(result.removed).toEqual(['targets/a', 'targets/a/b']);
      expect(resolver.listDelegations().map(role => role.name)).toEqual(['targets/ab']);
    });

    it('should treat deleting an absent delegation as a no-op', () => {
      expect(resolver.applyDelegationChange('delete', 'targets/missing', edit()).removed).toEqual([]);
    });
  });

  describe('resolveForPath', () => {
    beforeEach(() => {
      resolver.applyDelegationChange('create', 'targets/releases', edit({ addKeys: [key('k1')], addPaths: ['releases/'] }));
      resolver.applyDelegationChange('create', 'targets/all', edit({ addKeys: [key('k2')], addPaths: [''] }));
      resolver.applyDelegationChange('create', 'targets/releases/stable', edit({ addKeys: [key('k3')], addPaths: ['releases/stable/'] }));
      resolver.applyDelegationChange('create', 'targets/all/docs', edit({ addKeys: [key('k4')], addPaths: ['releases/'] }));
    });

    it('should order deepest first, ties by registration, and end with targets', () => {
      const names = resolver.resolveForPath('releases/stable/v1.tgz').map(role => role.name);

      expect(names).toEqual([
        'targets/releases/stable',
        'targets/all/docs',
        'targets/releases',
        'targets/all',
        'targets',
      ]);
    });

    it('should give targets the catch-all path', () => {
      const resolved = resolver.resolveForPath('nothing/matches');

      expect(resolved.map(role => role.name)).toEqual(['targets/all', 'targets']);
      expect(resolved[1]).toEqual({ ...targetsRole, paths: [''] });
    });

    it('should be deterministic', () => {
      expect(resolver.resolveForPath('releases/x')).toEqual(resolver.resolveForPath('releases/x'));
    });

    it('should require every ancestor to match', () => {
      resolver.applyDelegationChange('update', 'targets/releases', edit({ clearAllPaths: true, addPaths: ['other/'] }));

      expect(resolver.covers('targets/releases/stable', 'releases/stable/v1')).toBe(false);
      expect(resolver.resolveForPath('releases/stable/v1').map(role => role.name)).not.toContain('targets/releases/stable');
    });
  });

  describe('priorityOrder', () => {
    it('should walk breadth first in registration order', () => {
      resolver.applyDelegationChange('create', 'targets/b', edit({ addKeys: [key('k1')], addPaths: [''] }));
      resolver.applyDelegationChange('create', 'targets/b/c', edit({ addKeys: [key('k1')], addPaths: [''] }));
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: [''] }));

      expect(resolver.priorityOrder()).toEqual(['targets', 'targets/b', 'targets/a', 'targets/b/c']);
    });
  });

  describe('clone', () => {
    it('should not share delegations', () => {
      resolver.applyDelegationChange('create', 'targets/a', edit({ addKeys: [key('k1')], addPaths: ['a/'] }));
      const copy = resolver.clone();

      copy.applyDelegationChange('delete', 'targets/a', edit());

      expect(resolver.has('targets/a')).toBe(true);
      expect(copy.has('targets/a')).toBe(false);
    });
  });
});
