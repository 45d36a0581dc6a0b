export { canonicalize, canonicalBytes, calculateChecksum, sha256Hex } from './checksum';
export {
  isKeyAlgorithm,
  computeKeyId,
  createPublicKeyEntity,
  generateKeys,
  toPublicKey,
  signatureMethodFor,
} from './keys';
export { signBytes, verifyBytes } from './signatures';
