/**
 * One RSA signing key as published in the provider's JSON Web Key Set (RFC 7517).
 */
export interface SigningKeyRecord {
  /** Key type - 'RSA' for the provider's signing keys */
  readonly kty: string;

  /** Algorithm intended for use with this key - 'RS256' */
  readonly alg: string;

  /** Key usage - 'sig' for signature verification */
  readonly use: string;

  /** Key identifier used to match keys in ID token headers */
  readonly kid: string;

  /** RSA modulus, base64url-encoded big-endian unsigned integer */
  readonly n: string;

  /** RSA public exponent, base64url-encoded big-endian unsigned integer */
  readonly e: string;
}

/**
 * Snapshot of the provider's published keys.
 * Treated as immutable while in use; a refresh publishes a new snapshot.
 */
export interface KeySet {
  readonly keys: readonly SigningKeyRecord[];
}

/**
 * RSA public key reconstructed from a {@link SigningKeyRecord}.
 */
export interface PublicKey {
  modulus: bigint;
  exponent: number;
}
