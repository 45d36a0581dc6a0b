import { generateKeyPair, createPrivateKey, createPublicKey } from "crypto";
import type { KeyObject } from "crypto";
import { promisify } from "util";
import { calculateChecksum } from "./checksum";
import { KEY_ALGORITHMS } from "../trust_types";
import type { KeyAlgorithm, PrivateKey, PublicKey, SignatureMethod } from "../trust_types";
import { DetailedValidationError } from "../trust_errors";

const generateKeyPairAsync = promisify(generateKeyPair);

/**
 * SPKI DER prefix for a raw Ed25519 public key (RFC 8410):
 * [algorithm identifier (12 bytes)] + [raw public key (32 bytes)]
 */
const ED25519_SPKI_PREFIX = Buffer.from([
  0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65,
  0x70, 0x03, 0x21, 0x00
]);

export function isKeyAlgorithm(value: unknown): value is KeyAlgorithm {
  return typeof value === 'string' && (KEY_ALGORITHMS as readonly string[]).includes(value);
}

/**
 * Key id: SHA-256 of the canonical `{keytype, keyval: {public}}` document.
 */
export function computeKeyId(algorithm: KeyAlgorithm, publicMaterial: string): string {
  return calculateChecksum({ keytype: algorithm, keyval: { public: publicMaterial } });
}

/**
 * Builds the tagged PublicKey for untyped algorithm/material pairs, such as
 * keys arriving from a wire message.
 */
export function createPublicKeyEntity(algorithm: string, publicMaterial: string): PublicKey {
  if (!isKeyAlgorithm(algorithm)) {
    throw new DetailedValidationError('PublicKey', [
      { field: 'algorithm', message: 'unsupported key algorithm', value: algorithm },
    ]);
  }
  if (!publicMaterial) {
    throw new DetailedValidationError('PublicKey', [
      { field: 'public', message: 'must not be empty', value: publicMaterial },
    ]);
  }
  const keyId = computeKeyId(algorithm, publicMaterial);
  switch (algorithm) {
    case 'ed25519':
      return { algorithm, keyId, public: publicMaterial };
    case 'ecdsa':
      return { algorithm, keyId, public: publicMaterial };
    case 'rsa':
      return { algorithm, keyId, public: publicMaterial };
  }
}

/**
 * Generates a new key pair for the given algorithm.
 *
 * Ed25519 public keys are kept raw (32 bytes -> 44 chars base64); ECDSA
 * (P-256) and RSA public keys are SPKI DER. Private keys are PKCS#8 DER.
 */
export async function generateKeys(algorithm: KeyAlgorithm): Promise<PrivateKey> {
  switch (algorithm) {
    case 'ed25519': {
      const { publicKey, privateKey } = await generateKeyPairAsync('ed25519', {
        publicKeyEncoding: { type: 'spki', format: 'der' },
        privateKeyEncoding: { type: 'pkcs8', format: 'der' },
      });
      // Raw key is the last 32 bytes of the SPKI encoding
      const publicMaterial = publicKey.subarray(-32).toString('base64');
      return {
        algorithm,
        keyId: computeKeyId(algorithm, publicMaterial),
        public: publicMaterial,
        private: privateKey.toString('base64'),
      };
    }
    case 'ecdsa': {
      const { publicKey, privateKey } = await generateKeyPairAsync('ec', {
        namedCurve: 'prime256v1',
        publicKeyEncoding: { type: 'spki', format: 'der' },
        privateKeyEncoding: { type: 'pkcs8', format: 'der' },
      });
      const publicMaterial = publicKey.toString('base64');
      return {
        algorithm,
        keyId: computeKeyId(algorithm, publicMaterial),
        public: publicMaterial,
        private: privateKey.toString('base64'),
      };
    }
    case 'rsa': {
      const { publicKey, privateKey } = await generateKeyPairAsync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'der' },
        privateKeyEncoding: { type: 'pkcs8', format: 'der' },
      });
      const publicMaterial = publicKey.toString('base64');
      return {
        algorithm,
        keyId: computeKeyId(algorithm, publicMaterial),
        public: publicMaterial,
        private: privateKey.toString('base64'),
      };
    }
  }
}

export function toPublicKey(key: PrivateKey): PublicKey {
  return createPublicKeyEntity(key.algorithm, key.public);
}

export function signatureMethodFor(algorithm: KeyAlgorithm): SignatureMethod {
  switch (algorithm) {
    case 'ed25519':
      return 'ed25519';
    case 'ecdsa':
      return 'ecdsa';
    case 'rsa':
      return 'rsapss';
  }
}

export function privateKeyObject(key: PrivateKey): KeyObject {
  return createPrivateKey({
    key: Buffer.from(key.private, 'base64'),
    format: 'der',
    type: 'pkcs8',
  });
}

export function publicKeyObject(key: PublicKey): KeyObject {
  const der = Buffer.from(key.public, 'base64');
  switch (key.algorithm) {
    case 'ed25519':
      return createPublicKey({
        key: Buffer.concat([ED25519_SPKI_PREFIX, der]),
        format: 'der',
        type: 'spki',
      });
    case 'ecdsa':
    case 'rsa':
      return createPublicKey({ key: der, format: 'der', type: 'spki' });
  }
}
