import { z } from 'zod';

export const SessionIdentitySchema = z.object({
  id: z.string().min(1, 'id is required'),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  username: z.string().min(1, 'username is required'),
  title: z.string(),
  status: z.number().int(),
  role: z.number().int(),
});

export type SessionIdentity = z.infer<typeof SessionIdentitySchema>;

export const SessionClaimsSchema = SessionIdentitySchema.extend({
  iat: z.number().int(),
  exp: z.number().int(),
});

export type SessionClaims = z.infer<typeof SessionClaimsSchema>;

export function parseSessionClaims(payload: unknown): SessionClaims | null {
  const result = SessionClaimsSchema.safeParse(payload);
  return result.success ? result.data : null;
}
