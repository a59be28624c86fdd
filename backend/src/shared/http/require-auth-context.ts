/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authenticated user" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  userId: number;
  email: string | null;
  tokenExpiresAt: Date | null;
}>;

export function requireAuthContext(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || ctx.userId === null) {
    throw AppError.unauthorized('Authentication required');
  }

  return {
    userId: ctx.userId,
    email: ctx.email,
    tokenExpiresAt: ctx.tokenExpiresAt,
  };
}
