import type {
  Change,
  DelegationEdit,
  DelegationRole,
  GUN,
  KeyAlgorithm,
  PublicKey,
  Role,
  RoleKeyEdit,
  RoleName,
  RoleWithSignatures,
  Target,
  TargetSignedStruct,
  TargetWithRole,
} from '../trust_types';
import { BaseRoles, ChangeTypes } from '../trust_types';
import type { CryptoService } from '../crypto_service/crypto_service.types';
import type { Changelist } from '../changelist/changelist.types';
import type { RemoteAuthority } from '../remote_authority/remote_authority';
import type { Generation } from '../signed_metadata/signed_metadata.types';
import type { IEventStream } from '../event_bus/event_bus';
import type { TrustEvent } from '../event_bus/types';
import type { Logger } from '../logger';
import type {
  ITrustSession,
  PublishOptions,
  PublishResult,
  SessionState,
  TrustSessionDependencies,
} from './trust_session.types';
import {
  AlreadyInitializedError,
  DetailedValidationError,
  InvalidRoleError,
  NotFoundError,
  NotInitializedError,
  PublishCancelledError,
  PublishInProgressError,
  SessionFailedError,
  UnimplementedError,
  UnknownDelegationError,
  isTrustError,
} from '../trust_errors';
import { createChange } from '../changelist/change_factory';
import { emptyChangeContent, encodeChangeContent } from '../validation/change_content_validator';
import { loadTarget } from '../validation/target_validator';
import { assertThresholdBounds, isServerManageable, isTopLevelRole } from '../role_registry/role_registry';
import { FoldResult, applyChange, foldChanges } from './change_folder';
import { MetadataSigner } from './metadata_signer';
import { TrustState } from './trust_state';
import { createLogger } from '../logger';

function assertRoles(entity: string, roles: RoleName[]): void {
  if (roles.length === 0) {
    throw new DetailedValidationError(entity, [{ field: 'roles', message: 'must name at least one role', value: roles }]);
  }
}

function delegationEdit(overrides: Partial<DelegationEdit>): DelegationEdit {
  return { addKeys: [], removeKeys: [], addPaths: [], removePaths: [], clearAllPaths: false, ...overrides };
}

/**
 * TrustSession
 *
 * Owns the committed trust state of one GUN and its changelist. Staging
 * validates each change against the committed state with the changelist
 * folded in; publish folds, signs and verifies on a copy and swaps it in
 * only when every step succeeded.
 *
 * @example
 * ```typescript
 * const session = new TrustSession({ gun, crypto, changelist: createMemoryChangelist() });
 * const rootKey = await crypto.create('root', gun, 'ed25519');
 * await session.initialize([rootKey.keyId]);
 * await session.addTarget({ name: 'img:v1', length: 1024, hashes: { sha256: 'deadbeef' } });
 * await session.publish();
 * session.listTargets(); // [{ target: { name: 'img:v1', ... }, role: 'targets' }]
 * ```
 */
export class TrustSession implements ITrustSession {
  private readonly gun: GUN;
  private readonly crypto: CryptoService;
  private readonly changelist: Changelist;
  private readonly remote: RemoteAuthority | undefined;
  private readonly eventBus: IEventStream | undefined;
  private readonly keyAlgorithm: KeyAlgorithm;
  private readonly logger: Logger;
  private readonly signer: MetadataSigner;

  private committed: TrustState;
  private generation: Generation | null = null;
  private state: SessionState = 'uninitialized';
  private busy = false;
  /** Settles once every staging call that has started has finished. */
  private stagingTail: Promise<void> = Promise.resolve();

  constructor(dependencies: TrustSessionDependencies) {
    this.gun = dependencies.gun;
    this.crypto = dependencies.crypto;
    this.changelist = dependencies.changelist;
    this.remote = dependencies.remote;
    this.eventBus = dependencies.eventBus;
    this.keyAlgorithm = dependencies.keyAlgorithm ?? 'ed25519';
    this.logger = dependencies.logger ?? createLogger('[TrustSession] ');
    this.signer = new MetadataSigner({
      gun: this.gun,
      crypto: this.crypto,
      remote: this.remote,
      logger: this.logger,
    });
    this.committed = this.emptyState();
  }

  getGun(): GUN {
    return this.gun;
  }

  getState(): SessionState {
    return this.state;
  }

  getCryptoService(): CryptoService {
    return this.crypto;
  }

  getGeneration(): Generation | null {
    return this.generation ? structuredClone(this.generation) : null;
  }

  // ==================== Lifecycle ====================

  /**
   * Creates and signs generation 1 and pushes it to the remote authority
   * when one is configured.
   */
  async initialize(rootKeyIds: string[], serverManagedRoles: RoleName[] = []): Promise<void> {
    this.assertNotFailed('initialize');
    if (this.committed.isInitialized()) {
      throw new AlreadyInitializedError(this.gun);
    }
    this.acquire();
    try {
      await this.stagingTail;
      const candidate = this.emptyState();
      await candidate.registry.initialize(rootKeyIds, serverManagedRoles);

      const fold = new FoldResult();
      fold.touched.add(BaseRoles.Root);
      fold.touched.add(BaseRoles.Targets);
      await this.signer.signTouched(candidate, fold);
      candidate.generation = 1;

      const generation = this.generationOf(candidate);
      await this.remote?.publish(generation);
      this.commit(candidate, generation);

      const pending = await this.changelist.list();
      this.state = pending.length > 0 ? 'staging' : 'initialized';
      this.logger.info(`Initialized ${this.gun} (generation 1)`);
      this.emit({
        type: 'trust.session.initialized',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: { gun: this.gun, generation: 1, rootKeyIds: [...rootKeyIds], serverManagedRoles: [...serverManagedRoles] },
      });
    } finally {
      this.release();
    }
  }

  /**
   * Folds the changelist into a new signed generation.
   *
   * @throws PublishInProgressError when another publish is running
   * @throws PublishCancelledError when `signal` aborts before signing
   * @throws ThresholdNotMetError when a touched role cannot be signed to threshold
   */
  async publish(options: PublishOptions = {}): Promise<PublishResult> {
    this.assertNotFailed('publish');
    this.assertInitialized('publish');
    this.acquire();

    this.state = 'publishing';
    let committed = false;
    try {
      await this.stagingTail;
      const changes = await this.changelist.list();
      if (changes.length === 0) {
        this.state = 'initialized';
        return { generation: null, changeCount: 0, touchedRoles: [] };
      }
      if (options.signal?.aborted) {
        throw new PublishCancelledError(this.gun);
      }

      this.logger.info(`Publishing ${changes.length} change(s) for ${this.gun}`);
      this.emit({
        type: 'trust.publish.started',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: { gun: this.gun, changeCount: changes.length },
      });

      const candidate = this.committed.clone();
      const fold = foldChanges(candidate, changes);
      if (options.signal?.aborted) {
        throw new PublishCancelledError(this.gun);
      }

      const touchedRoles = await this.signer.signTouched(candidate, fold);
      candidate.generation = this.committed.generation + 1;
      const generation = this.generationOf(candidate);
      await this.remote?.publish(generation);

      this.commit(candidate, generation);
      committed = true;
      await this.changelist.clear();
      this.state = 'initialized';

      this.logger.info(`Published generation ${candidate.generation} for ${this.gun} (${touchedRoles.join(', ')})`);
      this.emit({
        type: 'trust.publish.succeeded',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: { gun: this.gun, generation: candidate.generation, touchedRoles },
      });
      return { generation: candidate.generation, changeCount: changes.length, touchedRoles };
    } catch (error) {
      if (committed) {
        this.state = 'failed';
        this.logger.error(`Generation for ${this.gun} was committed but the changelist could not be cleared`);
      } else {
        this.state = 'staging';
        this.logger.warn(`Publish for ${this.gun} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      this.emit({
        type: 'trust.publish.failed',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: {
          gun: this.gun,
          message: error instanceof Error ? error.message : String(error),
          ...(isTrustError(error) ? { code: error.code } : {}),
        },
      });
      throw error;
    } finally {
      this.release();
    }
  }

  /**
   * Deletes remote trust data first (when asked), then the local
   * changelist and committed state. Keys stay in custody.
   */
  async deleteTrustData(deleteRemote: boolean): Promise<void> {
    if (deleteRemote && !this.remote) {
      throw new UnimplementedError('deleting remote trust data', 'no remote authority is configured');
    }
    this.acquire();
    try {
      await this.stagingTail;
      if (deleteRemote) {
        await this.remote?.deleteTrustData(this.gun);
      }
      await this.changelist.clear();
      this.committed = this.emptyState();
      this.generation = null;
      this.state = 'uninitialized';
      this.logger.info(`Deleted ${deleteRemote ? 'local and remote' : 'local'} trust data for ${this.gun}`);
      this.emit({
        type: 'trust.data.deleted',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: { gun: this.gun, remote: deleteRemote },
      });
    } finally {
      this.release();
    }
  }

  // ==================== Targets ====================

  /**
   * Stages one create per role (default `targets`).
   * @throws DetailedValidationError for a malformed target or an empty role list
   * @throws PathNotAuthorizedError when a role does not cover the name
   */
  async addTarget(target: Target, roles: RoleName[] = [BaseRoles.Targets]): Promise<void> {
    const valid = loadTarget(target);
    assertRoles('Target', roles);
    const content = encodeChangeContent({ length: valid.length, hashes: valid.hashes });
    const changes = roles.map(role => createChange('create', role, ChangeTypes.Target, valid.name, content));
    await this.stage('add a target', () => changes);
  }

  async removeTarget(name: string, roles: RoleName[] = [BaseRoles.Targets]): Promise<void> {
    assertRoles('TargetRemoval', roles);
    const changes = roles.map(role => createChange('delete', role, ChangeTypes.Target, name, emptyChangeContent()));
    await this.stage('remove a target', () => changes);
  }

  listTargets(roles: RoleName[] = []): TargetWithRole[] {
    return this.read('list targets').catalog.listTargets(roles);
  }

  getTargetByName(name: string, roles: RoleName[] = []): TargetWithRole {
    return this.read('get a target').catalog.getTargetByName(name, roles);
  }

  getAllTargetMetadataByName(name: string): TargetSignedStruct[] {
    return this.read('get target metadata').catalog.getAllTargetMetadataByName(name);
  }

  getChangelist(): Promise<Change[]> {
    return this.changelist.list();
  }

  // ==================== Roles and delegations ====================

  /**
   * Top-level roles, then delegations in registration order.
   */
  listRoles(): RoleWithSignatures[] {
    const state = this.read('list roles');
    const delegations = state.resolver.listDelegations().map(delegation => ({
      role: this.roleView(delegation),
      signatures: state.registry.getSignatures(delegation.name),
    }));
    return [...state.registry.listRoles(), ...delegations];
  }

  getDelegationRoles(): DelegationRole[] {
    return this.read('list delegations').resolver.listDelegations();
  }

  async listDelegations(includePending: boolean = false): Promise<DelegationRole[]> {
    if (!includePending) {
      return this.getDelegationRoles();
    }
    this.assertInitialized('list delegations');
    const pending = await this.pendingState();
    return pending.resolver.listDelegations();
  }

  async addDelegation(name: RoleName, keys: PublicKey[], paths: string[]): Promise<void> {
    await this.stageDelegation('create', name, delegationEdit({ addKeys: keys, addPaths: paths }));
  }

  async addDelegationRoleAndKeys(name: RoleName, keys: PublicKey[]): Promise<void> {
    await this.stageDelegation('create', name, delegationEdit({ addKeys: keys }));
  }

  async addDelegationPaths(name: RoleName, paths: string[]): Promise<void> {
    await this.stageDelegation('update', name, delegationEdit({ addPaths: paths }));
  }

  async removeDelegationKeysAndPaths(name: RoleName, keyIds: string[], paths: string[]): Promise<void> {
    await this.stageDelegation('update', name, delegationEdit({ removeKeys: keyIds, removePaths: paths }));
  }

  /**
   * Stages removal of a delegation, its descendants and their targets.
   * @throws UnknownDelegationError
   */
  async removeDelegationRole(name: RoleName): Promise<void> {
    await this.stageDelegation('delete', name, delegationEdit({}));
  }

  async removeDelegationPaths(name: RoleName, paths: string[]): Promise<void> {
    await this.stageDelegation('update', name, delegationEdit({ removePaths: paths }));
  }

  async removeDelegationKeys(name: RoleName, keyIds: string[]): Promise<void> {
    await this.stageDelegation('update', name, delegationEdit({ removeKeys: keyIds }));
  }

  async clearDelegationPaths(name: RoleName): Promise<void> {
    await this.stageDelegation('update', name, delegationEdit({ clearAllPaths: true }));
  }

  /**
   * Stages a re-sign of each existing role; unknown roles are skipped.
   * @returns the roles staged
   */
  async witness(roles: RoleName[]): Promise<RoleName[]> {
    const staged = await this.stage('witness roles', pending => roles
      .filter(role => pending.hasRole(role))
      .map(role => createChange('update', role, ChangeTypes.Witness, '', emptyChangeContent())));
    return staged.map(change => change.scope);
  }

  /**
   * Stages new keys for a top-level role: the custody keys in `keyList`,
   * a fresh custody key when the list is empty, or a key from the remote
   * authority when the server manages it.
   *
   * @throws InvalidRoleError for delegations or a threshold outside 1..|keys|
   * @throws NotFoundError when custody does not hold a listed key
   * @throws UnimplementedError when server management is asked for without a remote authority
   */
  async rotateKey(role: RoleName, serverManagesKey: boolean, keyList: string[] = [], threshold: number = 1): Promise<void> {
    this.assertStagingAllowed('rotate keys');
    if (!isTopLevelRole(role)) {
      throw new InvalidRoleError(role, 'only top-level role keys can be rotated');
    }

    const keyIds = Array.from(new Set(keyList));
    let keys: PublicKey[];
    if (serverManagesKey) {
      if (!isServerManageable(role)) {
        throw new InvalidRoleError(role, 'only snapshot and timestamp keys can be managed by the server');
      }
      if (!this.remote) {
        throw new UnimplementedError('server-managed key rotation', 'no remote authority is configured');
      }
      assertThresholdBounds(role, 1, threshold);
      keys = [await this.remote.rotateRoleKey(this.gun, role)];
    } else if (keyIds.length === 0) {
      assertThresholdBounds(role, 1, threshold);
      keys = [await this.crypto.create(role, this.gun, this.keyAlgorithm)];
    } else {
      assertThresholdBounds(role, keyIds.length, threshold);
      keys = [];
      for (const keyId of keyIds) {
        const key = await this.crypto.getKey(keyId);
        if (!key) {
          throw new NotFoundError('key', keyId);
        }
        keys.push(key);
      }
    }

    const edit: RoleKeyEdit = { keys, threshold, serverManaged: serverManagesKey };
    const change = createChange('update', role, ChangeTypes.Role, '', encodeChangeContent(edit));
    await this.stage('rotate keys', () => [change]);
    this.committed.registry.invalidateRole(role);

    this.logger.info(`Staged key rotation for ${this.gun}:${role} (${keys.map(key => key.keyId).join(', ')})`);
    this.emit({
      type: 'trust.key.rotation_staged',
      timestamp: Date.now(),
      source: 'trust_session',
      payload: { gun: this.gun, role, keyIds: keys.map(key => key.keyId), serverManaged: serverManagesKey },
    });
  }

  // ==================== Internals ====================

  private emptyState(): TrustState {
    return TrustState.empty({
      gun: this.gun,
      crypto: this.crypto,
      remote: this.remote,
      keyAlgorithm: this.keyAlgorithm,
      logger: this.logger,
    });
  }

  private async stageDelegation(action: 'create' | 'update' | 'delete', name: RoleName, edit: DelegationEdit): Promise<void> {
    const content = action === 'delete' ? emptyChangeContent() : encodeChangeContent(edit);
    const change = createChange(action, name, ChangeTypes.Delegation, '', content);
    await this.stage(action === 'delete' ? 'remove a delegation' : 'edit a delegation', pending => {
      if (action === 'delete' && !pending.resolver.has(name)) {
        throw new UnknownDelegationError(name);
      }
      return [change];
    });
  }

  /**
   * Queues a staging call behind the ones already running. Publish,
   * initialize and deleteTrustData wait for the queue to drain after taking
   * the guard, and staging calls made after that are rejected here.
   */
  private async stage(operation: string, plan: (pending: TrustState) => Change[]): Promise<Change[]> {
    this.assertStagingAllowed(operation);
    const run = this.stagingTail.then(() => this.append(plan));
    // failures reach the caller through `run`
    this.stagingTail = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Applies the planned changes to the pending view and appends them only
   * when every one of them applies.
   */
  private async append(plan: (pending: TrustState) => Change[]): Promise<Change[]> {
    const pending = await this.pendingState();
    const changes = plan(pending);
    const fold = new FoldResult();
    for (const change of changes) {
      applyChange(pending, change, fold);
    }

    for (const change of changes) {
      await this.changelist.add(change);
      this.emit({
        type: 'trust.change.staged',
        timestamp: Date.now(),
        source: 'trust_session',
        payload: { gun: this.gun, action: change.action, scope: change.scope, changeType: change.type, path: change.path },
      });
    }
    if (changes.length > 0 && !this.busy) {
      this.state = 'staging';
    }
    return changes;
  }

  /**
   * Committed state with the current changelist folded in.
   */
  private async pendingState(): Promise<TrustState> {
    const state = this.committed.clone();
    foldChanges(state, await this.changelist.list());
    return state;
  }

  private commit(candidate: TrustState, generation: Generation): void {
    this.committed = candidate;
    this.generation = generation;
  }

  private generationOf(state: TrustState): Generation {
    return {
      gun: this.gun,
      number: state.generation,
      metadata: Object.fromEntries(structuredClone(Array.from(state.metadata))),
    };
  }

  private roleView(delegation: DelegationRole): Role {
    return {
      ...delegation,
      rootRole: { keyIds: Object.keys(delegation.keys), threshold: delegation.threshold },
    };
  }

  private read(operation: string): TrustState {
    const state = this.committed;
    if (!state.isInitialized()) {
      throw new NotInitializedError(this.gun, operation);
    }
    return state;
  }

  private acquire(): void {
    if (this.busy) {
      throw new PublishInProgressError(this.gun);
    }
    this.busy = true;
  }

  private release(): void {
    this.busy = false;
  }

  private assertInitialized(operation: string): void {
    if (!this.committed.isInitialized()) {
      throw new NotInitializedError(this.gun, operation);
    }
  }

  private assertNotFailed(operation: string): void {
    if (this.state === 'failed') {
      throw new SessionFailedError(this.gun, operation);
    }
  }

  private assertStagingAllowed(operation: string): void {
    this.assertNotFailed(operation);
    this.assertInitialized(operation);
    if (this.busy) {
      throw new PublishInProgressError(this.gun);
    }
  }

  private emit(event: TrustEvent): void {
    this.eventBus?.publish(event);
  }
}
