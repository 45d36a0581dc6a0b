export {
  BaseRoles,
  TOP_LEVEL_ROLES,
  SERVER_MANAGEABLE_ROLES,
  KEY_ALGORITHMS,
  CHANGE_ACTIONS,
  ChangeTypes,
} from './trust.types';

export type {
  GUN,
  RoleName,
  BaseRoleName,
  KeyAlgorithm,
  SignatureMethod,
  Ed25519PublicKey,
  EcdsaPublicKey,
  RsaPublicKey,
  PublicKey,
  PrivateKey,
  BaseRole,
  RootRole,
  Role,
  DelegationRole,
  Target,
  TargetWithRole,
  Signature,
  TargetSignedStruct,
  RoleWithSignatures,
  ChangeAction,
  ChangeType,
  Change,
  TargetMeta,
  DelegationEdit,
  RoleKeyEdit,
} from './trust.types';
