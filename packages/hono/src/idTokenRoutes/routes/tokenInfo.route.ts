import {
  type IdTokenVerifierConfig,
  KeySetError,
  TokenVerificationError,
} from '@id-token-verifier/core';
import type { Handler } from 'hono';
import { ZodError } from 'zod';

import { getIdTokenVerifier } from '../../idTokenVerifier.js';
import { TokenInfoRequestSchema } from '../../schemas/tokenInfoRequest.schema.js';

/**
 * Creates a route handler that verifies a posted `id_token` and returns its claims.
 * Accepts form-encoded or JSON bodies.
 * @param config - The verifier config
 * @returns Route handler for the token info endpoint
 */
export function tokenInfoRouteHandler(config: IdTokenVerifierConfig): Handler {
  return async (c) => {
    try {
      const contentType = c.req.header('Content-Type') ?? '';
      let body: unknown = {};
      if (contentType.includes('application/json')) {
        body = await c.req.json();
      } else if (
        contentType.includes('multipart/form-data') ||
        contentType.includes('application/x-www-form-urlencoded')
      ) {
        const formData = await c.req.formData();
        body = { id_token: formData.get('id_token') };
      }
      const { id_token } = TokenInfoRequestSchema.parse(body);

      const verifier = getIdTokenVerifier(config);
      return c.json(await verifier.verify(id_token));
    } catch (error) {
      config.logger?.error({ error, path: c.req.path }, 'Token info endpoint error');
      if (error instanceof ZodError || error instanceof SyntaxError) {
        return c.json({ error: 'Invalid token info parameters' }, 400);
      }
      if (error instanceof TokenVerificationError) {
        return c.json({ error: 'Authentication failed', code: error.code }, 401);
      }
      if (error instanceof KeySetError) {
        return c.json({ error: 'Key set unavailable' }, 502);
      }

      return c.json({ error: 'Internal server error' }, 500);
    }
  };
}
