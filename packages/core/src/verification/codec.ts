import { createHash } from 'node:crypto';

import { base64url } from 'jose';

import { fail, ok, type Result, TokenErrorCodes } from '../errors.js';

/** Decoded segments of a compact ID token */
export interface SplitToken {
  header: Uint8Array;
  payload: Uint8Array;
  signature: Uint8Array;
  /** SHA-256 of the encoded `header.payload` signing input */
  signedDigest: Uint8Array;
}

// after padding: alphabet characters followed by at most two '='
const PADDED_BASE64URL = /^[A-Za-z0-9_-]*={0,2}$/;

/**
 * Decodes a base64url string, padding it with `=` to a multiple of four first.
 *
 * @param segment - base64url text, padded or not
 * @returns Decoded bytes, or undefined when the text is not valid base64url
 */
export function decodeBase64Url(segment: string): Uint8Array | undefined {
  const padded = segment.padEnd(Math.ceil(segment.length / 4) * 4, '=');
  if (!PADDED_BASE64URL.test(padded)) {
    return undefined;
  }
  try {
    return base64url.decode(padded);
  } catch {
    return undefined;
  }
}

/**
 * Splits a compact token into its three decoded segments and computes the digest the
 * signature covers.
 *
 * @param token - Compact `header.payload.signature` token
 */
export function splitToken(token: string): Result<SplitToken> {
  const segments = token.split('.');
  if (segments.length !== 3) {
    return fail(
      TokenErrorCodes.MALFORMED_TOKEN,
      `Token must have 3 segments, got ${segments.length}`,
    );
  }

  const [headerSegment, payloadSegment, signatureSegment] = segments;
  const header = decodeBase64Url(headerSegment);
  const payload = decodeBase64Url(payloadSegment);
  const signature = decodeBase64Url(signatureSegment);
  if (!header || !payload || !signature) {
    return fail(TokenErrorCodes.MALFORMED_TOKEN, 'Token segment is not valid base64url');
  }

  const signedDigest = createHash('sha256')
    .update(`${headerSegment}.${payloadSegment}`, 'utf8')
    .digest();

  return ok({ header, payload, signature, signedDigest: new Uint8Array(signedDigest) });
}
