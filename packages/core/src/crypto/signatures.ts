import { sign, verify, constants } from "crypto";
import type { KeyObject } from "crypto";
import { privateKeyObject, publicKeyObject, signatureMethodFor } from "./keys";
import type { PrivateKey, PublicKey, Signature, SignatureMethod } from "../trust_types";
import { createLogger } from "../logger";
const logger = createLogger("[CryptoModule] ");

function rawSign(method: SignatureMethod, payload: Uint8Array, key: KeyObject): Buffer {
  switch (method) {
    case 'ed25519':
      return sign(null, payload, key);
    case 'ecdsa':
      return sign('sha256', payload, key);
    case 'rsapss':
      return sign('sha256', payload, {
        key,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
      });
  }
}

function rawVerify(method: SignatureMethod, payload: Uint8Array, key: KeyObject, signature: Buffer): boolean {
  switch (method) {
    case 'ed25519':
      return verify(null, payload, key, signature);
    case 'ecdsa':
      return verify('sha256', payload, key, signature);
    case 'rsapss':
      return verify('sha256', payload, {
        key,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
      }, signature);
  }
}

/**
 * Signs raw bytes. The returned signature is not yet verified, so
 * `isValid` starts out false.
 */
export function signBytes(key: PrivateKey, payload: Uint8Array): Signature {
  const method = signatureMethodFor(key.algorithm);
  const signature = rawSign(method, payload, privateKeyObject(key));

  return {
    keyId: key.keyId,
    method,
    signature: signature.toString('base64'),
    isValid: false,
  };
}

/**
 * Verifies one signature against a public key.
 * A method that does not belong to the key's algorithm never verifies.
 */
export function verifyBytes(key: PublicKey, payload: Uint8Array, signature: Signature): boolean {
  if (signature.keyId !== key.keyId) {
    return false;
  }
  if (signature.method !== signatureMethodFor(key.algorithm)) {
    logger.debug(`Signature method ${signature.method} does not match ${key.algorithm} key ${key.keyId}`);
    return false;
  }

  try {
    return rawVerify(signature.method, payload, publicKeyObject(key), Buffer.from(signature.signature, 'base64'));
  } catch (error) {
    logger.warn(`Malformed key or signature for ${key.keyId}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}
