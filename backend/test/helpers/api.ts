import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

export const UserResponseSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  name: z.string(),
  picture: z.string().nullable(),
  google_id: z.string().nullable(),
  wallet_address: z.string().nullable(),
  created_at: z.string(),
});

export const AuthResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.literal('bearer'),
  expires_in: z.number(),
  is_new_user: z.boolean(),
  user: UserResponseSchema,
});

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
    type: z.string(),
    details: z.array(z.object({ field: z.string().optional(), message: z.string() })),
  }),
});

export type AuthResponse = z.infer<typeof AuthResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export async function emailLogin(
  app: FastifyInstance,
  body: { email: string; name: string; picture?: string } = { email: 'ada@example.com', name: 'Ada' },
): Promise<AuthResponse> {
  const res = await app.inject({ method: 'POST', url: '/api/v1/auth/email', payload: body });
  if (res.statusCode !== 200) throw new Error(`email login failed: ${res.statusCode} ${res.body}`);
  return AuthResponseSchema.parse(res.json());
}

export function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}
