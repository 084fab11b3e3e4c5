import { z } from 'zod';

/**
 * Zod schema for validating token info requests.
 */
export const TokenInfoRequestSchema = z.object({
  id_token: z.string().min(1, 'id_token is required'),
});

/**
 * Type representing a validated token info request.
 */
export type TokenInfoRequest = z.infer<typeof TokenInfoRequestSchema>;
