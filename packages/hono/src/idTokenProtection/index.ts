import {
  type IdTokenVerifierConfig,
  KeySetError,
  type TokenClaims,
  TokenVerificationError,
} from '@id-token-verifier/core';
import type { MiddlewareHandler } from 'hono';
import { endTime, startTime } from 'hono/timing';

import { getIdTokenVerifier } from '../idTokenVerifier.js';
import { BearerAuthorizationSchema } from '../schemas/bearerAuthorization.schema.js';

/**
 * Context variables available when using ID token protection middleware.
 */
export interface IdTokenContextVariables {
  idTokenClaims: TokenClaims;
}

/**
 * Creates middleware that verifies the bearer ID token and protects routes.
 * @param config - The verifier configuration object
 * @returns Hono middleware handler that validates Google ID tokens
 */
export function secureIdToken(
  config: IdTokenVerifierConfig,
): MiddlewareHandler<{ Variables: IdTokenContextVariables }> {
  return async (c, next) => {
    startTime(c, 'secureIdTokenMiddleware');

    const result = BearerAuthorizationSchema.safeParse(c.req.header('Authorization'));
    if (!result.success) {
      return c.text('ID token required', 401);
    }

    const verifier = getIdTokenVerifier(config);
    let claims: TokenClaims;
    startTime(c, 'verifyIdToken');
    try {
      claims = await verifier.verify(result.data);
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        return c.text('Invalid ID token', 401);
      }
      if (error instanceof KeySetError) {
        config.logger?.error({ error, path: c.req.path }, 'ID token key set unavailable');
        return c.text('Key set unavailable', 502);
      }
      throw error;
    } finally {
      endTime(c, 'verifyIdToken');
    }

    c.set('idTokenClaims', claims);

    endTime(c, 'secureIdTokenMiddleware');
    await next();
  };
}
