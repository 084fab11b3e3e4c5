export { type IdTokenContextVariables, secureIdToken } from './idTokenProtection/index.js';
export { tokenInfoRouteHandler } from './idTokenRoutes/index.js';
export { getIdTokenVerifier } from './idTokenVerifier.js';
export { BearerAuthorizationSchema } from './schemas/bearerAuthorization.schema.js';
export {
  type TokenInfoRequest,
  TokenInfoRequestSchema,
} from './schemas/tokenInfoRequest.schema.js';
