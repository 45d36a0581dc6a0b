import type { DelegationEdit, PublicKey, RoleKeyEdit, TargetMeta } from '../trust_types';
import { DetailedValidationError } from '../trust_errors';
import { computeKeyId } from '../crypto/keys';
import { assertValid } from './common';
import { loadTargetMeta } from './target_validator';

const EMPTY_CONTENT = new Uint8Array(0);

export function encodeChangeContent(value: unknown): Uint8Array {
  return Buffer.from(JSON.stringify(value), 'utf8');
}

export function emptyChangeContent(): Uint8Array {
  return EMPTY_CONTENT;
}

function decodeJson(entity: string, content: Uint8Array): unknown {
  const text = Buffer.from(content).toString('utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DetailedValidationError(entity, [
      { field: 'content', message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`, value: text },
    ]);
  }
}

/** Each keyId must equal the id derived from its key material. */
function assertKeyIds(entity: string, keys: PublicKey[]): void {
  const mismatched = keys.filter(key => computeKeyId(key.algorithm, key.public) !== key.keyId);
  if (mismatched.length > 0) {
    throw new DetailedValidationError(entity, mismatched.map(key => ({
      field: 'keyId',
      message: 'does not match key material',
      value: key.keyId,
    })));
  }
}

export function decodeTargetMeta(content: Uint8Array): TargetMeta {
  return loadTargetMeta(decodeJson('TargetMeta', content));
}

export function decodeDelegationEdit(content: Uint8Array): DelegationEdit {
  const edit = assertValid<DelegationEdit>('DelegationEdit', 'DelegationEdit', decodeJson('DelegationEdit', content));
  assertKeyIds('DelegationEdit', edit.addKeys);
  return edit;
}

export function decodeRoleKeyEdit(content: Uint8Array): RoleKeyEdit {
  const edit = assertValid<RoleKeyEdit>('RoleKeyEdit', 'RoleKeyEdit', decodeJson('RoleKeyEdit', content));
  assertKeyIds('RoleKeyEdit', edit.keys);
  return edit;
}
