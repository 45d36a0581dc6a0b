import type { BaseRole, BaseRoleName, DelegationRole, GUN, PublicKey, RoleName, RootRole, Target } from '../trust_types';
import { TOP_LEVEL_ROLES } from '../trust_types';
import { calculateChecksum, canonicalBytes } from '../crypto/checksum';
import type {
  MetaEntry,
  MetadataPayload,
  RootPayload,
  SignedMetadata,
  SnapshotPayload,
  TargetsPayload,
  TimestampPayload,
} from './signed_metadata.types';

function rootRoleOf(role: BaseRole): RootRole {
  return { keyIds: Object.keys(role.keys), threshold: role.threshold };
}

/**
 * Root lists every top-level role's key ids and threshold along with the
 * public keys themselves.
 */
export function buildRootPayload(gun: GUN, version: number, roles: BaseRole[]): RootPayload {
  const keys: Record<string, PublicKey> = {};
  const entries: Partial<Record<BaseRoleName, RootRole>> = {};
  for (const role of roles) {
    Object.assign(keys, role.keys);
    const name = TOP_LEVEL_ROLES.find(candidate => candidate === role.name);
    if (name) {
      entries[name] = rootRoleOf(role);
    }
  }
  const { root, targets, snapshot, timestamp } = entries;
  if (!root || !targets || !snapshot || !timestamp) {
    throw new Error(`Root metadata for ${gun} needs all top-level roles`);
  }
  return { type: 'root', gun, version, keys, roles: { root, targets, snapshot, timestamp } };
}

/**
 * Metadata of `targets` or one delegation: its targets and its direct
 * child delegations, in registration order.
 */
export function buildTargetsPayload(
  gun: GUN,
  role: RoleName,
  version: number,
  targets: Target[],
  children: DelegationRole[]
): TargetsPayload {
  const keys: Record<string, PublicKey> = {};
  for (const child of children) {
    Object.assign(keys, child.keys);
  }
  return {
    type: 'targets',
    gun,
    role,
    version,
    targets: Object.fromEntries(targets.map(target => [target.name, { length: target.length, hashes: { ...target.hashes } }])),
    delegations: {
      keys,
      roles: children.map(child => ({
        name: child.name,
        keyIds: Object.keys(child.keys),
        threshold: child.threshold,
        paths: [...child.paths],
      })),
    },
  };
}

export function metaEntryOf(metadata: SignedMetadata): MetaEntry {
  return { version: metadata.payload.version, checksum: calculateChecksum(metadata) };
}

/**
 * Snapshot pins the version and checksum of root and every targets-tree role.
 */
export function buildSnapshotPayload(gun: GUN, version: number, metadata: SignedMetadata[]): SnapshotPayload {
  return {
    type: 'snapshot',
    gun,
    version,
    meta: Object.fromEntries(metadata.map(entry => [entry.role, metaEntryOf(entry)])),
  };
}

export function buildTimestampPayload(gun: GUN, version: number, snapshot: SignedMetadata): TimestampPayload {
  return { type: 'timestamp', gun, version, snapshot: metaEntryOf(snapshot) };
}

/**
 * The bytes that get signed: canonical JSON of the payload.
 */
export function payloadBytes(payload: MetadataPayload): Uint8Array {
  return canonicalBytes(payload);
}
