import { fail, ok, type Result, TokenErrorCodes } from '../errors.js';
import type { PublicKey } from '../interfaces/keySet.js';

import { decodeBase64Url } from './codec.js';

const EXPONENT_WIDTH_BYTES = 8;
const MIN_EXPONENT = 2n;
const MAX_EXPONENT = 2n ** 31n - 1n;

/**
 * Interprets bytes as a big-endian unsigned integer of any length.
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Reads a short big-endian byte string as a fixed-width unsigned 64-bit integer,
 * left-padding it with zero bytes.
 */
function readExponent(bytes: Uint8Array): bigint | undefined {
  if (bytes.length > EXPONENT_WIDTH_BYTES) {
    return undefined;
  }
  const padded = new Uint8Array(EXPONENT_WIDTH_BYTES);
  padded.set(bytes, EXPONENT_WIDTH_BYTES - bytes.length);
  return new DataView(padded.buffer).getBigUint64(0, false);
}

/**
 * Builds an RSA public key from a key record's base64url modulus and exponent.
 *
 * @param n - base64url modulus
 * @param e - base64url public exponent (usually `AQAB`, i.e. 65537)
 */
export function buildPublicKey(n: string, e: string): Result<PublicKey> {
  const modulusBytes = decodeBase64Url(n);
  const exponentBytes = decodeBase64Url(e);
  if (!modulusBytes || !exponentBytes) {
    return fail(
      TokenErrorCodes.INVALID_KEY_MATERIAL,
      'Key modulus or exponent is not valid base64url',
    );
  }

  const modulus = bytesToBigInt(modulusBytes);
  if (modulus === 0n) {
    return fail(TokenErrorCodes.INVALID_KEY_MATERIAL, 'Key modulus is empty');
  }

  const exponent = readExponent(exponentBytes);
  if (exponent === undefined || exponent < MIN_EXPONENT || exponent > MAX_EXPONENT) {
    return fail(TokenErrorCodes.INVALID_KEY_MATERIAL, 'Key exponent is out of range');
  }

  return ok({ modulus, exponent: Number(exponent) });
}
