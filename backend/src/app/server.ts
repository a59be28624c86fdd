/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Global request + auth contexts and the error handler are attached here;
 *   routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';

import type { AppConfig } from './config';
import type { Logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; logger: Logger }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  await app.register(cors, { origin: opts.config.corsOrigins });

  // Uploads: one file per request, capped at UPLOAD_MAX_BYTES (413 beyond).
  await app.register(multipart, {
    limits: { fileSize: opts.config.uploadMaxBytes, files: 1 },
  });

  // Global context plugins
  registerRequestContext(app, opts.logger);
  registerAuthContext(app);
  registerErrorHandler(app);

  // Basic request logging (includes requestId)
  app.addHook('onResponse', (req, reply, done) => {
    opts.logger.info('request', {
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      requestId: req.requestContext?.requestId,
      userId: req.authContext?.userId ?? null,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
