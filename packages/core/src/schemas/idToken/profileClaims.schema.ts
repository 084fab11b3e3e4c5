import { z } from 'zod';

// some provider endpoints send email_verified as a string
const EmailVerifiedSchema = z
  .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
  .default(false);

export const ProfileClaimsSchema = z.object({
  email: z.string().default(''),
  email_verified: EmailVerifiedSchema,
  name: z.string().default(''),
  given_name: z.string().default(''),
  family_name: z.string().default(''),
  picture: z.string().default(''),
  locale: z.string().default(''),
});
