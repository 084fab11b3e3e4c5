import { z } from 'zod';

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Zod schema for an `Authorization: Bearer <id_token>` header; yields the token.
 */
export const BearerAuthorizationSchema = z
  .string()
  .regex(/^Bearer\s+\S+$/i, 'Bearer token required')
  .transform((header) => header.replace(BEARER_PREFIX, ''));
