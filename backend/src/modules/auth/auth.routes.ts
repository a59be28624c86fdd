/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';
import type { AuthController } from './auth.controller';

export const AUTH_PREFIX = '/api/v1/auth';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  bearerGuard: preHandlerHookHandler,
) {
  app.post(`${AUTH_PREFIX}/google`, controller.google.bind(controller));
  app.post(`${AUTH_PREFIX}/email`, controller.email.bind(controller));
  app.get(`${AUTH_PREFIX}/me`, { preHandler: bearerGuard }, controller.me.bind(controller));
  app.get(`${AUTH_PREFIX}/health`, controller.health.bind(controller));
}
