export {
  fromWireTarget,
  toWireTarget,
  fromWireTargetWithRole,
  toWireTargetWithRole,
  fromWireSignature,
  toWireSignature,
  fromWirePublicKey,
  toWirePublicKey,
  fromWireRole,
  toWireRole,
  fromWireDelegationRole,
  toWireDelegationRole,
  fromWireTargetSigned,
  toWireTargetSigned,
  fromWireRoleWithSignatures,
  toWireRoleWithSignatures,
  fromWireChange,
  toWireChange,
  changelistFromSnapshot,
} from './converters';
export type {
  WireTarget,
  WireTargetWithRole,
  WireSignature,
  WirePublicKey,
  WireRootRole,
  WireRole,
  WireDelegationRole,
  WireTargetSigned,
  WireRoleWithSignatures,
  WireChange,
} from './wire.types';
