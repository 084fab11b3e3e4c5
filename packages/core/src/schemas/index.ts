export { AudienceSchema, IdTokenSchema } from './common.schema.js';
export { KeySetSchema, SigningKeyRecordSchema } from './idToken/keySet.schema.js';
export { ProfileClaimsSchema } from './idToken/profileClaims.schema.js';
export { RegisteredClaimsSchema } from './idToken/registeredClaims.schema.js';
export { TokenClaimsSchema, type TokenClaims } from './idToken/tokenClaims.schema.js';
export { TokenHeaderSchema, type TokenHeader } from './idToken/tokenHeader.schema.js';
export {
  IdTokenVerifierConfigSchema,
  KeySetOptionsSchema,
} from './verifierConfig.schema.js';
