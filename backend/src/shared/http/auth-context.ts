/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every request carries an authContext, authenticated or not.
 * - The bearer guard (bearer-auth.ts) overwrites it on protected routes once the
 *   session token has been validated.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous context on every request.
 * 2. The bearer guard fills userId/email/tokenExpiresAt on protected routes.
 * 3. Controllers read it through requireAuthContext().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: number | null;
  email: string | null;
  tokenExpiresAt: Date | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return { userId: null, email: null, tokenExpiresAt: null };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
