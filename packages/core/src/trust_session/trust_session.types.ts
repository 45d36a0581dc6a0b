import type {
  Change,
  DelegationRole,
  GUN,
  KeyAlgorithm,
  PublicKey,
  RoleName,
  RoleWithSignatures,
  Target,
  TargetSignedStruct,
  TargetWithRole,
} from '../trust_types';
import type { CryptoService } from '../crypto_service/crypto_service.types';
import type { Changelist } from '../changelist/changelist.types';
import type { RemoteAuthority } from '../remote_authority/remote_authority';
import type { Generation } from '../signed_metadata/signed_metadata.types';
import type { IEventStream } from '../event_bus/event_bus';
import type { Logger } from '../logger';

export type SessionState = 'uninitialized' | 'initialized' | 'staging' | 'publishing' | 'failed';

export interface TrustSessionDependencies {
  gun: GUN;
  crypto: CryptoService;
  changelist: Changelist;
  remote?: RemoteAuthority;
  eventBus?: IEventStream;
  /** Algorithm for keys the session creates (default: ed25519) */
  keyAlgorithm?: KeyAlgorithm;
  logger?: Logger;
}

export interface PublishOptions {
  /** Aborting before signing starts cancels the publish without side effects */
  signal?: AbortSignal;
}

export interface PublishResult {
  /** New generation number, or null when there was nothing to publish */
  generation: number | null;
  changeCount: number;
  touchedRoles: RoleName[];
}

/**
 * Trust Session - one GUN's committed trust state, its staged changelist,
 * and the atomic publish between them.
 */
export interface ITrustSession {
  getGun(): GUN;
  getState(): SessionState;
  getCryptoService(): CryptoService;
  getGeneration(): Generation | null;

  initialize(rootKeyIds: string[], serverManagedRoles?: RoleName[]): Promise<void>;
  publish(options?: PublishOptions): Promise<PublishResult>;
  deleteTrustData(deleteRemote: boolean): Promise<void>;

  addTarget(target: Target, roles?: RoleName[]): Promise<void>;
  removeTarget(name: string, roles?: RoleName[]): Promise<void>;
  listTargets(roles?: RoleName[]): TargetWithRole[];
  getTargetByName(name: string, roles?: RoleName[]): TargetWithRole;
  getAllTargetMetadataByName(name: string): TargetSignedStruct[];
  getChangelist(): Promise<Change[]>;

  listRoles(): RoleWithSignatures[];
  getDelegationRoles(): DelegationRole[];
  listDelegations(includePending?: boolean): Promise<DelegationRole[]>;

  addDelegation(name: RoleName, keys: PublicKey[], paths: string[]): Promise<void>;
  addDelegationRoleAndKeys(name: RoleName, keys: PublicKey[]): Promise<void>;
  addDelegationPaths(name: RoleName, paths: string[]): Promise<void>;
  removeDelegationKeysAndPaths(name: RoleName, keyIds: string[], paths: string[]): Promise<void>;
  removeDelegationRole(name: RoleName): Promise<void>;
  removeDelegationPaths(name: RoleName, paths: string[]): Promise<void>;
  removeDelegationKeys(name: RoleName, keyIds: string[]): Promise<void>;
  clearDelegationPaths(name: RoleName): Promise<void>;

  witness(roles: RoleName[]): Promise<RoleName[]>;
  rotateKey(role: RoleName, serverManagesKey: boolean, keyList?: string[], threshold?: number): Promise<void>;
}
