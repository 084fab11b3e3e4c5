import type { z } from 'zod';

import { ProfileClaimsSchema } from './profileClaims.schema.js';
import { RegisteredClaimsSchema } from './registeredClaims.schema.js';

export const TokenClaimsSchema = RegisteredClaimsSchema.extend(ProfileClaimsSchema.shape);

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;
