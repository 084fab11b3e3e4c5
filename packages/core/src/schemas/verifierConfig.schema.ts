import type { Logger } from 'pino';
import { z } from 'zod';

import type { FetchLike } from '../interfaces/verifierConfig.js';

import { AudienceSchema } from './common.schema.js';

export const KeySetOptionsSchema = z.object({
  defaultTtlSeconds: z.number().int().positive().optional(),
  fetchTimeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
});

export const IdTokenVerifierConfigSchema = z.object({
  audience: AudienceSchema,
  fetch: z.custom<FetchLike>((value) => typeof value === 'function', 'fetch is required'),
  certsUrl: z.url().optional(),
  logger: z.custom<Logger>((value) => typeof value === 'object' && value !== null).optional(),
  keySet: KeySetOptionsSchema.optional(),
  clock: z
    .custom<() => number>((value) => typeof value === 'function', 'clock must be a function')
    .optional(),
});
