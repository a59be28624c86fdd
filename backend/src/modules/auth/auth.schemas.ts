/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Request body validation for the auth endpoints.
 *
 * RULES:
 * - Controllers call safeParse and map failures to AppError.validationError (422).
 */

import { z } from 'zod';
import { USER_FIELD_LIMITS } from '../users/user.types';

export const googleLoginSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  id_token: z.string().min(1).optional(),
});

export const emailLoginSchema = z.object({
  email: z.string().trim().email().max(USER_FIELD_LIMITS.email),
  name: z.string().trim().min(1).max(USER_FIELD_LIMITS.name),
  picture: z.string().url().max(USER_FIELD_LIMITS.picture).optional(),
});

export type GoogleLoginInput = z.infer<typeof googleLoginSchema>;
export type EmailLoginInput = z.infer<typeof emailLoginSchema>;
