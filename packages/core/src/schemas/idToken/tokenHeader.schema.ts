import { z } from 'zod';

/**
 * JOSE header of a provider ID token. Only `kid` is needed to pick the verification key;
 * the signature is always checked as RS256 whatever `alg` claims.
 */
export const TokenHeaderSchema = z.object({
  kid: z.string(),
  alg: z.string().optional(),
  typ: z.string().optional(),
});

export type TokenHeader = z.infer<typeof TokenHeaderSchema>;
