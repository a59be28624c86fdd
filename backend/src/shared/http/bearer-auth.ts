/**
 * backend/src/shared/http/bearer-auth.ts
 *
 * WHY:
 * - Protected routes accept a session token as `Authorization: Bearer <token>`.
 * - The guard runs as a preHandler: on any failure the route handler never runs.
 *
 * HOW TO USE:
 * - const bearerGuard = createBearerGuard(issuer)
 * - app.get('/x', { preHandler: bearerGuard }, handler)
 * - handler: const { userId } = requireAuthContext(req)
 *
 * RULES:
 * - Scheme is case-insensitive; exactly one token after it.
 * - Missing or malformed header → UNAUTHORIZED. Token failures keep their
 *   own types (INVALID_TOKEN, TOKEN_EXPIRED, MALFORMED_TOKEN). All are 401.
 * - Does not consult the user directory.
 */

import type { FastifyRequest, preHandlerHookHandler } from 'fastify';
import { AppError } from './errors';
import {
  SessionTokenError,
  type SessionTokenErrorReason,
  type SessionTokenIssuer,
} from '../security/session-token';

const BEARER_PATTERN = /^bearer\s+(\S+)$/i;

const REASON_TO_CODE = {
  INVALID: 'INVALID_TOKEN',
  EXPIRED: 'TOKEN_EXPIRED',
  MALFORMED: 'MALFORMED_TOKEN',
} as const satisfies Record<SessionTokenErrorReason, string>;

export function extractBearerToken(header: string | undefined): string {
  if (!header) throw AppError.unauthorized('Missing Authorization header');

  const match = BEARER_PATTERN.exec(header.trim());
  if (!match?.[1]) throw AppError.unauthorized('Authorization header must be: Bearer <token>');

  return match[1];
}

export function createBearerGuard(issuer: SessionTokenIssuer): preHandlerHookHandler {
  return (req: FastifyRequest, _reply, done) => {
    try {
      const session = issuer.validate(extractBearerToken(req.headers.authorization));
      req.authContext = {
        userId: session.userId,
        email: session.email,
        tokenExpiresAt: session.expiresAt,
      };
    } catch (err) {
      done(toAuthError(err));
      return;
    }

    done();
  };
}

function toAuthError(err: unknown): Error {
  if (err instanceof SessionTokenError) {
    return new AppError({
      code: REASON_TO_CODE[err.reason],
      status: 401,
      message: err.message,
    });
  }
  return err instanceof Error ? err : new Error(String(err));
}
