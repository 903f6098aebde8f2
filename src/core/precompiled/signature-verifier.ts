/**
 * Ed25519 detached signature helpers
 */

import * as crypto from 'crypto';

export const PUBLIC_KEY_SIZE = 32;
export const PRIVATE_KEY_SIZE = 64;
export const SIGNATURE_SIZE = 64;

// RFC 8410 DER 접두사: 원시 32바이트 키를 KeyObject로 감싸기 위함
const SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');
const PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');

export interface Ed25519KeyPair {
  publicKey: Buffer;
  /** seed(32) + publicKey(32) */
  privateKey: Buffer;
}

function toPublicKeyObject(publicKey: Uint8Array): crypto.KeyObject {
  return crypto.createPublicKey({
    key: Buffer.concat([SPKI_PREFIX, publicKey]),
    format: 'der',
    type: 'spki',
  });
}

function toPrivateKeyObject(seed: Uint8Array): crypto.KeyObject {
  return crypto.createPrivateKey({
    key: Buffer.concat([PKCS8_PREFIX, seed]),
    format: 'der',
    type: 'pkcs8',
  });
}

/**
 * 서명 검증
 * 키/서명 길이가 맞지 않거나 키가 유효하지 않으면 false (예외를 던지지 않음)
 */
export function verifySignature(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_SIZE || signature.length !== SIGNATURE_SIZE) {
    return false;
  }

  let keyObject: crypto.KeyObject;
  try {
    keyObject = toPublicKeyObject(publicKey);
  } catch {
    return false;
  }

  return crypto.verify(null, message, keyObject, signature);
}

/**
 * 서명 생성 (privateKey는 64바이트 seed+public 또는 32바이트 seed)
 * 64바이트 키의 뒤 32바이트는 seed에서 유도한 공개키와 같아야 한다
 */
export function signMessage(privateKey: Uint8Array, message: Uint8Array): Buffer {
  if (privateKey.length !== PRIVATE_KEY_SIZE && privateKey.length !== PUBLIC_KEY_SIZE) {
    throw new Error(`private key must be ${PRIVATE_KEY_SIZE} bytes, got ${privateKey.length}`);
  }
  const keyObject = toPrivateKeyObject(privateKey.subarray(0, 32));
  if (privateKey.length === PRIVATE_KEY_SIZE) {
    const derived = crypto.createPublicKey(keyObject).export({ format: 'der', type: 'spki' }).subarray(SPKI_PREFIX.length);
    if (!derived.equals(privateKey.subarray(32))) {
      throw new Error('private key public half does not match its seed');
    }
  }
  return crypto.sign(null, message, keyObject);
}

/**
 * 새 키 쌍 생성
 */
export function generateKeyPair(): Ed25519KeyPair {
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  const rawPublic = publicKey.export({ format: 'der', type: 'spki' }).subarray(SPKI_PREFIX.length);
  const seed = privateKey.export({ format: 'der', type: 'pkcs8' }).subarray(PKCS8_PREFIX.length);
  return {
    publicKey: Buffer.from(rawPublic),
    privateKey: Buffer.concat([seed, rawPublic]),
  };
}
