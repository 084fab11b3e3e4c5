import { timingSafeEqual } from 'node:crypto';

import { fail, ok, type Result, TokenErrorCodes } from '../errors.js';
import type { PublicKey } from '../interfaces/keySet.js';

import { bytesToBigInt } from './keyMaterial.js';

/**
 * DER encoding of the DigestInfo prefix for SHA-256 (RFC 8017 §9.2, note 1).
 */
const SHA256_DIGEST_INFO_PREFIX = Uint8Array.from([
  0x30, 0x31, 0x30, 0x0d, 0x06, 0x09, 0x60, 0x86, 0x48, 0x01, 0x65, 0x03, 0x04, 0x02, 0x01,
  0x05, 0x00, 0x04, 0x20,
]);
const SHA256_DIGEST_LENGTH = 32;

function byteLength(value: bigint): number {
  return Math.ceil(value.toString(16).length / 2);
}

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n;
  let square = base % modulus;
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining & 1n) {
      result = (result * square) % modulus;
    }
    square = (square * square) % modulus;
    remaining >>= 1n;
  }
  return result;
}

/** I2OSP: big-endian encoding of `value` in exactly `length` bytes */
function toFixedBytes(value: bigint, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let remaining = value;
  for (let index = length - 1; index >= 0; index--) {
    bytes[index] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return bytes;
}

/**
 * EMSA-PKCS1-v1_5 encoding of a SHA-256 digest:
 * `00 01 FF..FF 00 || DigestInfo || digest`, `length` bytes long.
 */
export function encodePkcs1v15Sha256(digest: Uint8Array, length: number): Uint8Array {
  const tLength = SHA256_DIGEST_INFO_PREFIX.length + digest.length;
  const encoded = new Uint8Array(length).fill(0xff);
  encoded[0] = 0x00;
  encoded[1] = 0x01;
  encoded[length - tLength - 1] = 0x00;
  encoded.set(SHA256_DIGEST_INFO_PREFIX, length - tLength);
  encoded.set(digest, length - digest.length);
  return encoded;
}

/**
 * RSASSA-PKCS1-v1_5 signature verification with SHA-256 (RFC 8017 §8.2.2).
 *
 * The signature is raised to the public exponent modulo the modulus and the result is
 * compared in constant time against the full expected encoding, so padding is never
 * parsed.
 *
 * @param publicKey - RSA public key of the signer
 * @param signedDigest - SHA-256 digest of the signing input
 * @param signature - Raw signature bytes
 */
export function verifySignature(
  publicKey: PublicKey,
  signedDigest: Uint8Array,
  signature: Uint8Array,
): Result<void> {
  const k = byteLength(publicKey.modulus);
  const tLength = SHA256_DIGEST_INFO_PREFIX.length + SHA256_DIGEST_LENGTH;

  if (signedDigest.length !== SHA256_DIGEST_LENGTH || k < tLength + 11) {
    return fail(TokenErrorCodes.INVALID_SIGNATURE, 'Signature verification failed');
  }
  if (signature.length !== k) {
    return fail(
      TokenErrorCodes.INVALID_SIGNATURE,
      `Signature length ${signature.length} does not match key length ${k}`,
    );
  }

  const s = bytesToBigInt(signature);
  if (s >= publicKey.modulus) {
    return fail(TokenErrorCodes.INVALID_SIGNATURE, 'Signature representative out of range');
  }

  const recovered = toFixedBytes(
    modPow(s, BigInt(publicKey.exponent), publicKey.modulus),
    k,
  );
  const expected = encodePkcs1v15Sha256(signedDigest, k);
  if (!timingSafeEqual(recovered, expected)) {
    return fail(TokenErrorCodes.INVALID_SIGNATURE, 'Signature verification failed');
  }

  return ok(undefined);
}
