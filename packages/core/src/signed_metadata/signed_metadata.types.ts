import type {
  BaseRoleName,
  GUN,
  PublicKey,
  RoleName,
  RootRole,
  Signature,
  TargetMeta,
} from '../trust_types';

export type RootPayload = {
  type: 'root';
  gun: GUN;
  version: number;
  keys: Record<string, PublicKey>;
  roles: Record<BaseRoleName, RootRole>;
};

export type DelegationEntry = {
  name: RoleName;
  keyIds: string[];
  threshold: number;
  paths: string[];
};

export type TargetsPayload = {
  type: 'targets';
  gun: GUN;
  role: RoleName;
  version: number;
  targets: Record<string, TargetMeta>;
  delegations: {
    keys: Record<string, PublicKey>;
    roles: DelegationEntry[];
  };
};

export type MetaEntry = {
  version: number;
  checksum: string;
};

export type SnapshotPayload = {
  type: 'snapshot';
  gun: GUN;
  version: number;
  meta: Record<RoleName, MetaEntry>;
};

export type TimestampPayload = {
  type: 'timestamp';
  gun: GUN;
  version: number;
  snapshot: MetaEntry;
};

export type MetadataPayload = RootPayload | TargetsPayload | SnapshotPayload | TimestampPayload;

/**
 * One role's metadata with the signatures over its canonical bytes.
 */
export type SignedMetadata = {
  role: RoleName;
  payload: MetadataPayload;
  signatures: Signature[];
};

/**
 * Every role's signed metadata at one point in time. Generation numbers
 * only ever increase for a GUN.
 */
export type Generation = {
  gun: GUN;
  number: number;
  metadata: Record<RoleName, SignedMetadata>;
};
