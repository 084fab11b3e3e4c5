/**
 * Error codes for ID token verification failures.
 * Each code identifies exactly one failing step of the verification pipeline.
 */
export const TokenErrorCodes = {
  /** Wrong segment count, invalid base64url or invalid JSON */
  MALFORMED_TOKEN: 'E_MALFORMED_TOKEN',
  /** `aud` claim does not equal the expected audience */
  AUDIENCE_MISMATCH: 'E_AUDIENCE_MISMATCH',
  /** `iss` claim is not one of the accepted issuers */
  ISSUER_MISMATCH: 'E_ISSUER_MISMATCH',
  /** Current time falls outside `[iat, exp]` */
  TOKEN_EXPIRED: 'E_TOKEN_EXPIRED',
  /** No key in the key set carries the token's `kid` */
  KEY_NOT_FOUND: 'E_KEY_NOT_FOUND',
  /** Key record's modulus or exponent cannot form an RSA public key */
  INVALID_KEY_MATERIAL: 'E_INVALID_KEY_MATERIAL',
  /** RSASSA-PKCS1-v1_5 verification failed */
  INVALID_SIGNATURE: 'E_INVALID_SIGNATURE',
} as const;

export type TokenErrorCode = (typeof TokenErrorCodes)[keyof typeof TokenErrorCodes];

/**
 * Error codes for key set retrieval failures.
 */
export const KeySetErrorCodes = {
  /** Network error, timeout or non-2xx response */
  KEY_SET_FETCH_FAILED: 'E_KEY_SET_FETCH_FAILED',
  /** Response body is not a valid key set document */
  KEY_SET_INVALID: 'E_KEY_SET_INVALID',
} as const;

export type KeySetErrorCode = (typeof KeySetErrorCodes)[keyof typeof KeySetErrorCodes];

/** Claims whose validation can fail */
export type ValidatedClaim = 'aud' | 'iss' | 'iat' | 'exp';

const TokenErrorHttpStatus: Record<TokenErrorCode, number> = {
  [TokenErrorCodes.MALFORMED_TOKEN]: 401,
  [TokenErrorCodes.AUDIENCE_MISMATCH]: 401,
  [TokenErrorCodes.ISSUER_MISMATCH]: 401,
  [TokenErrorCodes.TOKEN_EXPIRED]: 401,
  [TokenErrorCodes.KEY_NOT_FOUND]: 401,
  // the provider published a key we cannot use; not the caller's fault
  [TokenErrorCodes.INVALID_KEY_MATERIAL]: 500,
  [TokenErrorCodes.INVALID_SIGNATURE]: 401,
};

/**
 * ID token verification error with code, failing claim and HTTP status.
 */
export class TokenVerificationError extends Error {
  readonly code: TokenErrorCode;
  readonly claim?: ValidatedClaim;
  readonly httpStatus: number;

  constructor(code: TokenErrorCode, message: string, claim?: ValidatedClaim) {
    super(message);
    this.name = 'TokenVerificationError';
    this.code = code;
    this.claim = claim;
    this.httpStatus = TokenErrorHttpStatus[code];
  }
}

/**
 * Key set retrieval error with code and HTTP status.
 */
export class KeySetError extends Error {
  readonly code: KeySetErrorCode;
  readonly httpStatus = 502;

  constructor(code: KeySetErrorCode, message: string) {
    super(message);
    this.name = 'KeySetError';
    this.code = code;
  }
}

/**
 * Outcome of a single verification step: the value, or the error that stopped it.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TokenVerificationError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  code: TokenErrorCode,
  message: string,
  claim?: ValidatedClaim,
): Result<T> {
  return { ok: false, error: new TokenVerificationError(code, message, claim) };
}
