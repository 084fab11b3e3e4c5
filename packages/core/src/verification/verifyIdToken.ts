import type { z } from 'zod';

import { fail, ok, type Result, TokenErrorCodes, TokenVerificationError } from '../errors.js';
import type { KeySet } from '../interfaces/keySet.js';
import {
  type TokenClaims,
  TokenClaimsSchema,
  TokenHeaderSchema,
} from '../schemas/index.js';

import { validateClaims } from './claimValidator.js';
import { splitToken } from './codec.js';
import { buildPublicKey } from './keyMaterial.js';
import { selectKey } from './keySelector.js';
import { verifySignature } from './signatureVerifier.js';

/**
 * Verification outcome: the validated claims, or the first error encountered.
 */
export type VerificationResult =
  | { valid: true; claims: TokenClaims }
  | { valid: false; error: TokenVerificationError };

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeJsonSegment<T extends z.ZodType>(
  bytes: Uint8Array,
  schema: T,
  segmentName: string,
): Result<z.output<T>> {
  let json: unknown;
  try {
    json = JSON.parse(utf8.decode(bytes));
  } catch {
    return fail(TokenErrorCodes.MALFORMED_TOKEN, `Token ${segmentName} is not valid JSON`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return fail(
      TokenErrorCodes.MALFORMED_TOKEN,
      `Token ${segmentName} is invalid: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
    );
  }
  return ok(parsed.data);
}

/**
 * Verifies a Google ID token against an already-fetched key set.
 *
 * Steps, each stopping at its first failure:
 * 1. split and decode the compact token
 * 2. decode the payload claims
 * 3. check audience, issuer and validity window
 * 4. decode the header for its `kid`
 * 5. select the key with that `kid`
 * 6. rebuild the RSA public key
 * 7. verify the RS256 signature
 *
 * Pure and synchronous: identical inputs always give identical results.
 *
 * @param token - Compact ID token
 * @param keySet - Provider key set snapshot
 * @param expectedAudience - OAuth2 client ID the token must be issued to
 * @param now - Current time in seconds since the epoch
 *
 * @example
 * ```typescript
 * const result = verifyIdToken(idToken, keySet, 'client-123', Math.floor(Date.now() / 1000));
 * if (result.valid) {
 *   console.log('Signed in:', result.claims.email);
 * } else {
 *   console.error('Rejected:', result.error.code);
 * }
 * ```
 */
export function verifyIdToken(
  token: string,
  keySet: KeySet,
  expectedAudience: string,
  now: number,
): VerificationResult {
  const split = splitToken(token);
  if (!split.ok) {
    return { valid: false, error: split.error };
  }

  const claims = decodeJsonSegment(split.value.payload, TokenClaimsSchema, 'payload');
  if (!claims.ok) {
    return { valid: false, error: claims.error };
  }

  const claimCheck = validateClaims(claims.value, expectedAudience, now);
  if (!claimCheck.ok) {
    return { valid: false, error: claimCheck.error };
  }

  const header = decodeJsonSegment(split.value.header, TokenHeaderSchema, 'header');
  if (!header.ok) {
    return { valid: false, error: header.error };
  }

  const key = selectKey(keySet, header.value.kid);
  if (!key.ok) {
    return { valid: false, error: key.error };
  }

  const publicKey = buildPublicKey(key.value.n, key.value.e);
  if (!publicKey.ok) {
    return { valid: false, error: publicKey.error };
  }

  const signatureCheck = verifySignature(
    publicKey.value,
    split.value.signedDigest,
    split.value.signature,
  );
  if (!signatureCheck.ok) {
    return { valid: false, error: signatureCheck.error };
  }

  return { valid: true, claims: claims.value };
}

/**
 * Throwing variant of {@link verifyIdToken}.
 *
 * @returns Validated token claims
 * @throws {TokenVerificationError} When any verification step fails
 */
export function assertValidIdToken(
  token: string,
  keySet: KeySet,
  expectedAudience: string,
  now: number,
): TokenClaims {
  const result = verifyIdToken(token, keySet, expectedAudience, now);
  if (!result.valid) {
    throw result.error;
  }
  return result.claims;
}
