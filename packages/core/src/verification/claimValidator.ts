import { fail, ok, type Result, TokenErrorCodes } from '../errors.js';
import type { TokenClaims } from '../schemas/index.js';

/**
 * Issuers Google signs ID tokens as. Both the bare host and the https form occur.
 */
export const ACCEPTED_ISSUERS: readonly string[] = [
  'accounts.google.com',
  'https://accounts.google.com',
];

/**
 * Checks audience, issuer and validity window, in that order, stopping at the first failure.
 *
 * @param claims - Decoded ID token payload
 * @param expectedAudience - OAuth2 client ID the token must be issued to
 * @param now - Current time in seconds since the epoch
 */
export function validateClaims(
  claims: TokenClaims,
  expectedAudience: string,
  now: number,
): Result<void> {
  if (claims.aud !== expectedAudience) {
    return fail(
      TokenErrorCodes.AUDIENCE_MISMATCH,
      `Invalid audience: expected ${expectedAudience}, got ${claims.aud}`,
      'aud',
    );
  }

  if (!ACCEPTED_ISSUERS.includes(claims.iss)) {
    return fail(TokenErrorCodes.ISSUER_MISMATCH, `Invalid issuer: ${claims.iss}`, 'iss');
  }

  if (now < claims.iat) {
    return fail(
      TokenErrorCodes.TOKEN_EXPIRED,
      `Token not yet valid: issued at ${claims.iat}, now ${now}`,
      'iat',
    );
  }
  if (now > claims.exp) {
    return fail(
      TokenErrorCodes.TOKEN_EXPIRED,
      `Token expired at ${claims.exp}, now ${now}`,
      'exp',
    );
  }

  return ok(undefined);
}
