import { z } from 'zod';

/**
 * Common validation schemas used across the verifier
 */

export const IdTokenSchema = z.string().min(1, 'idToken is required');

export const AudienceSchema = z.string().min(1, 'audience is required');
