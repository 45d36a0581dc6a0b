import type {
  Change,
  DelegationRole,
  PublicKey,
  Role,
  RoleWithSignatures,
  Signature,
  SignatureMethod,
  Target,
  TargetSignedStruct,
  TargetWithRole,
} from '../trust_types';
import type {
  WireChange,
  WireDelegationRole,
  WirePublicKey,
  WireRole,
  WireRoleWithSignatures,
  WireSignature,
  WireTarget,
  WireTargetSigned,
  WireTargetWithRole,
} from './wire.types';
import { DetailedValidationError } from '../trust_errors';
import { assertValid } from '../validation/common';
import { loadTarget } from '../validation/target_validator';
import { createPublicKeyEntity } from '../crypto/keys';
import { createChange } from '../changelist/change_factory';
import { changelistFromChanges } from '../changelist/memory/memory_changelist';
import type { RecordChangelist } from '../changelist/record_changelist';

const SIGNATURE_METHODS: readonly SignatureMethod[] = ['ed25519', 'ecdsa', 'rsapss'];

function hexToBase64(hex: string): string {
  return Buffer.from(hex, 'hex').toString('base64');
}

function base64ToHex(base64: string): string {
  return Buffer.from(base64, 'base64').toString('hex');
}

function mapValues(record: Record<string, string>, convert: (value: string) => string): Record<string, string> {
  return Object.fromEntries(Object.entries(record).map(([name, value]) => [name, convert(value)]));
}

// ─────────────────────────────────────────────────────────
// Targets
// ─────────────────────────────────────────────────────────

export function fromWireTarget(data: unknown): Target {
  const wire = assertValid<WireTarget>('WireTarget', 'WireTarget', data);
  return loadTarget({ name: wire.name, length: wire.length, hashes: mapValues(wire.hashes, base64ToHex) });
}

export function toWireTarget(target: Target, gun?: string): WireTarget {
  return {
    ...(gun !== undefined ? { gun } : {}),
    name: target.name,
    length: target.length,
    hashes: mapValues(target.hashes, hexToBase64),
  };
}

export function fromWireTargetWithRole(data: WireTargetWithRole): TargetWithRole {
  return { target: fromWireTarget(data.target), role: data.role };
}

export function toWireTargetWithRole(entry: TargetWithRole): WireTargetWithRole {
  return { target: toWireTarget(entry.target), role: entry.role };
}

// ─────────────────────────────────────────────────────────
// Signatures and keys
// ─────────────────────────────────────────────────────────

/**
 * `isValid` from the wire is dropped: it is re-derived by verification.
 */
export function fromWireSignature(data: unknown): Signature {
  const wire = assertValid<WireSignature>('WireSignature', 'WireSignature', data);
  const method = SIGNATURE_METHODS.find(candidate => candidate === wire.method);
  if (!method) {
    throw new DetailedValidationError('WireSignature', [
      { field: 'method', message: 'unsupported signature method', value: wire.method },
    ]);
  }
  return { keyId: wire.keyID, method, signature: wire.signature, isValid: false };
}

export function toWireSignature(signature: Signature): WireSignature {
  return {
    keyID: signature.keyId,
    method: signature.method,
    signature: signature.signature,
    isValid: signature.isValid,
  };
}

/**
 * @throws DetailedValidationError when a supplied id does not match the key material
 */
export function fromWirePublicKey(data: unknown): PublicKey {
  const wire = assertValid<WirePublicKey>('WirePublicKey', 'WirePublicKey', data);
  const key = createPublicKeyEntity(wire.algorithm, wire.public);
  if (wire.id !== undefined && wire.id !== key.keyId) {
    throw new DetailedValidationError('WirePublicKey', [
      { field: 'id', message: `does not match key material (expected ${key.keyId})`, value: wire.id },
    ]);
  }
  return key;
}

export function toWirePublicKey(key: PublicKey): WirePublicKey {
  return { id: key.keyId, algorithm: key.algorithm, public: key.public };
}

// ─────────────────────────────────────────────────────────
// Roles
// ─────────────────────────────────────────────────────────

/**
 * Wire roles carry only the key-id view; keys stay empty.
 */
export function fromWireRole(data: unknown): Role {
  const wire = assertValid<WireRole>('WireRole', 'WireRole', data);
  return {
    name: wire.name,
    keys: {},
    threshold: wire.rootRole.threshold,
    paths: [...(wire.paths ?? [])],
    rootRole: { keyIds: [...wire.rootRole.keyIDs], threshold: wire.rootRole.threshold },
  };
}

export function toWireRole(role: Role): WireRole {
  return {
    name: role.name,
    paths: [...role.paths],
    rootRole: { keyIDs: [...role.rootRole.keyIds], threshold: role.rootRole.threshold },
  };
}

/**
 * Keys are re-keyed by the id derived from their material.
 */
export function fromWireDelegationRole(data: unknown): DelegationRole {
  const wire = assertValid<WireDelegationRole>('WireDelegationRole', 'WireDelegationRole', data);
  const keys: Record<string, PublicKey> = {};
  for (const wireKey of Object.values(wire.keys)) {
    const key = fromWirePublicKey(wireKey);
    keys[key.keyId] = key;
  }
  return { name: wire.name, keys, threshold: wire.threshold, paths: [...(wire.paths ?? [])] };
}

export function toWireDelegationRole(role: DelegationRole): WireDelegationRole {
  return {
    name: role.name,
    keys: Object.fromEntries(Object.values(role.keys).map(key => [key.keyId, toWirePublicKey(key)])),
    threshold: role.threshold,
    paths: [...role.paths],
  };
}

export function fromWireTargetSigned(data: WireTargetSigned): TargetSignedStruct {
  return {
    role: fromWireDelegationRole(data.role),
    target: fromWireTarget(data.target),
    signatures: data.signatures.map(fromWireSignature),
  };
}

export function toWireTargetSigned(entry: TargetSignedStruct): WireTargetSigned {
  return {
    role: toWireDelegationRole(entry.role),
    target: toWireTarget(entry.target),
    signatures: entry.signatures.map(toWireSignature),
  };
}

export function fromWireRoleWithSignatures(data: WireRoleWithSignatures): RoleWithSignatures {
  return { role: fromWireRole(data.role), signatures: data.signatures.map(fromWireSignature) };
}

export function toWireRoleWithSignatures(entry: RoleWithSignatures): WireRoleWithSignatures {
  return { role: toWireRole(entry.role), signatures: entry.signatures.map(toWireSignature) };
}

// ─────────────────────────────────────────────────────────
// Changes
// ─────────────────────────────────────────────────────────

export function fromWireChange(data: unknown): Change {
  const wire = assertValid<WireChange>('WireChange', 'WireChange', data);
  return createChange(wire.action, wire.scope, wire.type, wire.path ?? '', Buffer.from(wire.content ?? '', 'base64'));
}

export function toWireChange(change: Change): WireChange {
  return {
    action: change.action,
    scope: change.scope,
    type: change.type,
    path: change.path,
    content: Buffer.from(change.content).toString('base64'),
  };
}

/**
 * Rebuilds a changelist from a remote-reported list of changes.
 */
export function changelistFromSnapshot(wireChanges: unknown[]): Promise<RecordChangelist> {
  return changelistFromChanges(wireChanges.map(fromWireChange), 'remote');
}
