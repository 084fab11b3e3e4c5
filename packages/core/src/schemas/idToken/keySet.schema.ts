import { z } from 'zod';

export const SigningKeyRecordSchema = z.object({
  kty: z.string().default(''),
  alg: z.string().default(''),
  use: z.string().default(''),
  kid: z.string(),
  n: z.string(),
  e: z.string(),
});

/**
 * Provider certificate endpoint document: `{ "keys": [...] }`.
 * Unknown fields on the document and on each key are dropped.
 */
export const KeySetSchema = z.object({
  keys: z.array(SigningKeyRecordSchema),
});
