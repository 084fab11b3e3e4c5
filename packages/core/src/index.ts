export { IdTokenVerifier } from './idTokenVerifier.js';

export {
  fail,
  KeySetError,
  type KeySetErrorCode,
  KeySetErrorCodes,
  ok,
  type Result,
  type TokenErrorCode,
  TokenErrorCodes,
  TokenVerificationError,
  type ValidatedClaim,
} from './errors.js';

export type { KeySet, PublicKey, SigningKeyRecord } from './interfaces/keySet.js';
export type {
  FetchLike,
  IdTokenVerifierConfig,
  KeySetOptions,
} from './interfaces/verifierConfig.js';

export * from './schemas/index.js';

export {
  fetchKeySet,
  type FetchedKeySet,
  GOOGLE_CERTS_URL,
  KeySetService,
  parseCacheControlMaxAge,
  parseKeySet,
} from './services/keySet.service.js';

export { ACCEPTED_ISSUERS, validateClaims } from './verification/claimValidator.js';
export { decodeBase64Url, splitToken, type SplitToken } from './verification/codec.js';
export { buildPublicKey } from './verification/keyMaterial.js';
export { selectKey } from './verification/keySelector.js';
export { verifySignature } from './verification/signatureVerifier.js';
export {
  assertValidIdToken,
  type VerificationResult,
  verifyIdToken,
} from './verification/verifyIdToken.js';

export { formatError } from './utils/errorFormatting.js';
