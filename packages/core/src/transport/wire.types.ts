/**
 * Wire-shaped messages exchanged with a trust server. Byte fields are
 * base64 strings and key ids are spelled `keyID`, as they appear on the
 * wire. Nothing outside `transport/` sees these.
 */

export type WireTarget = {
  gun?: string;
  name: string;
  length: number;
  /** algorithm → base64 digest */
  hashes: Record<string, string>;
};

export type WireTargetWithRole = {
  target: WireTarget;
  role: string;
};

export type WireSignature = {
  keyID: string;
  method: string;
  signature: string;
  isValid?: boolean;
};

export type WirePublicKey = {
  id?: string;
  algorithm: string;
  public: string;
};

export type WireRootRole = {
  keyIDs: string[];
  threshold: number;
};

export type WireRole = {
  name: string;
  paths?: string[];
  rootRole: WireRootRole;
};

export type WireDelegationRole = {
  name: string;
  keys: Record<string, WirePublicKey>;
  threshold: number;
  paths?: string[];
};

export type WireTargetSigned = {
  role: WireDelegationRole;
  target: WireTarget;
  signatures: WireSignature[];
};

export type WireRoleWithSignatures = {
  role: WireRole;
  signatures: WireSignature[];
};

export type WireChange = {
  action: string;
  scope: string;
  type: string;
  path?: string;
  content?: string;
};
