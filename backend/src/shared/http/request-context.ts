/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Clients and proxies may already carry one (x-request-id); we reuse it
 *   when it looks sane so a single id spans the whole call chain.
 *
 * - The app's logger rides along, so request-scoped logs
 *   (withRequestContext) go wherever the composition root sent the rest.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app, logger).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../logger/logger';

export const REQUEST_ID_HEADER = 'x-request-id';

export type RequestContext = {
  requestId: string;
  logger: Logger;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

export function resolveRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance, logger: Logger) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER]);

    req.requestContext = { requestId, logger };
    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
