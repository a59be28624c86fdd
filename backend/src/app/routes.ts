/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health)
 *   - module routes (auth, detector)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { createBearerGuard } from '../shared/http/bearer-auth';
import { AUTH_PREFIX } from '../modules/auth/auth.routes';
import { DETECTOR_PREFIX } from '../modules/detector/detector.routes';

export const API_VERSION = '1.0.0';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  const bearerGuard = createBearerGuard(opts.deps.sessionTokens);

  app.get('/', () => {
    return {
      message: 'Baldness Detection API',
      version: API_VERSION,
      endpoints: {
        googleLogin: `${AUTH_PREFIX}/google`,
        emailLogin: `${AUTH_PREFIX}/email`,
        me: `${AUTH_PREFIX}/me`,
        detect: DETECTOR_PREFIX,
        detectStream: `${DETECTOR_PREFIX}/stream`,
      },
    };
  });

  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app, bearerGuard);
  opts.deps.detector.registerRoutes(app, bearerGuard);
}
