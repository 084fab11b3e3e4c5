import { z } from 'zod';

/**
 * OpenID Connect registered claims carried by every ID token.
 * Missing claims decode to empty values so that claim validation reports them.
 */
export const RegisteredClaimsSchema = z.object({
  iss: z.string().default(''),
  sub: z.string().default(''),
  azp: z.string().default(''),
  aud: z.string().default(''),
  iat: z.number().default(0),
  exp: z.number().default(0),
  at_hash: z.string().default(''),
});
