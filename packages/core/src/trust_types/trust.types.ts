/**
 * Trust metadata entities.
 *
 * These are the only shapes the core works with. Wire-shaped messages are
 * converted into them in `transport/` before they reach any component.
 */

/** Globally unique name of one trust collection */
export type GUN = string;

export type RoleName = string;

export const BaseRoles = {
  Root: 'root',
  Targets: 'targets',
  Snapshot: 'snapshot',
  Timestamp: 'timestamp',
} as const;

export type BaseRoleName = typeof BaseRoles[keyof typeof BaseRoles];

/** Registration order of the top-level roles */
export const TOP_LEVEL_ROLES: readonly BaseRoleName[] = [
  BaseRoles.Root,
  BaseRoles.Targets,
  BaseRoles.Snapshot,
  BaseRoles.Timestamp,
];

/** Only these roles may have their key held by the remote authority */
export const SERVER_MANAGEABLE_ROLES: readonly BaseRoleName[] = [
  BaseRoles.Snapshot,
  BaseRoles.Timestamp,
];

export type KeyAlgorithm = 'ed25519' | 'ecdsa' | 'rsa';

export const KEY_ALGORITHMS: readonly KeyAlgorithm[] = ['ed25519', 'ecdsa', 'rsa'];

export type SignatureMethod = 'ed25519' | 'ecdsa' | 'rsapss';

// ─────────────────────────────────────────────────────────
// Keys
// ─────────────────────────────────────────────────────────

/** Raw 32-byte Ed25519 public key, base64 */
export type Ed25519PublicKey = {
  algorithm: 'ed25519';
  keyId: string;
  public: string;
};

/** P-256 public key, SPKI DER base64 */
export type EcdsaPublicKey = {
  algorithm: 'ecdsa';
  keyId: string;
  public: string;
};

/** RSA public key, SPKI DER base64 */
export type RsaPublicKey = {
  algorithm: 'rsa';
  keyId: string;
  public: string;
};

export type PublicKey = Ed25519PublicKey | EcdsaPublicKey | RsaPublicKey;

/** Private keys are PKCS#8 DER, base64. Only custody implementations read them. */
export type PrivateKey =
  | { algorithm: 'ed25519'; keyId: string; public: string; private: string }
  | { algorithm: 'ecdsa'; keyId: string; public: string; private: string }
  | { algorithm: 'rsa'; keyId: string; public: string; private: string };

// ─────────────────────────────────────────────────────────
// Roles
// ─────────────────────────────────────────────────────────

export type BaseRole = {
  name: RoleName;
  keys: Record<string, PublicKey>;
  threshold: number;
};

/** Key-id view of a role used for root-of-trust bootstrapping */
export type RootRole = {
  keyIds: string[];
  threshold: number;
};

export type Role = BaseRole & {
  paths: string[];
  rootRole: RootRole;
};

export type DelegationRole = BaseRole & {
  paths: string[];
};

// ─────────────────────────────────────────────────────────
// Targets and signatures
// ─────────────────────────────────────────────────────────

export type Target = {
  name: string;
  length: number;
  hashes: Record<string, string>;
};

export type TargetWithRole = {
  target: Target;
  role: RoleName;
};

export type Signature = {
  keyId: string;
  method: SignatureMethod;
  /** base64 */
  signature: string;
  /** Derived from the last verification; never trusted on its own */
  isValid: boolean;
};

export type TargetSignedStruct = {
  role: DelegationRole;
  target: Target;
  signatures: Signature[];
};

export type RoleWithSignatures = {
  role: Role;
  signatures: Signature[];
};

// ─────────────────────────────────────────────────────────
// Changes
// ─────────────────────────────────────────────────────────

export type ChangeAction = 'create' | 'update' | 'delete';

export const CHANGE_ACTIONS: readonly ChangeAction[] = ['create', 'update', 'delete'];

export const ChangeTypes = {
  Target: 'target',
  Delegation: 'delegation',
  Role: 'role',
  Witness: 'witness',
} as const;

export type ChangeType = typeof ChangeTypes[keyof typeof ChangeTypes];

export type Change = Readonly<{
  action: ChangeAction;
  scope: RoleName;
  type: string;
  path: string;
  content: Uint8Array;
}>;

/** Content of a `target` create/update change */
export type TargetMeta = {
  length: number;
  hashes: Record<string, string>;
};

/** Content of a `delegation` change */
export type DelegationEdit = {
  newThreshold?: number;
  addKeys: PublicKey[];
  removeKeys: string[];
  addPaths: string[];
  removePaths: string[];
  clearAllPaths: boolean;
};

/** Content of a `role` change (key rotation) */
export type RoleKeyEdit = {
  keys: PublicKey[];
  threshold?: number;
  serverManaged: boolean;
};
