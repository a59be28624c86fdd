/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { SessionTokenIssuer } from '../../shared/security/session-token';
import type { Queue } from '../../shared/messaging/queue';
import type { UserDirectory } from '../users/user.directory';
import type { GoogleIdentityVerifier } from './credentials/google-identity.verifier';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  directory: UserDirectory;
  googleVerifier: GoogleIdentityVerifier;
  sessionTokens: SessionTokenIssuer;
  queue: Queue;
  rateLimiter: RateLimiter;
  emailKeyHasher: KeyedHasher;
  logger: Logger;
  emailLoginEnabled: boolean;
}) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance, bearerGuard: preHandlerHookHandler) {
      registerAuthRoutes(app, controller, bearerGuard);
    },
  };
}
