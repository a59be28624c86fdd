/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → its status and type.
 * - RateLimitError → 429.
 * - Fastify client errors (bad JSON, wrong content type, body too large) →
 *   same status, type BAD_REQUEST (PAYLOAD_TOO_LARGE for 413).
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 envelope.
 *
 * ENVELOPE:
 *   { "error": { "code": <http status>, "message": "...", "type": "<AppErrorCode>", "details": [] } }
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - 401 responses carry `WWW-Authenticate: Bearer`.
 * - Always use withRequestContext(req) so requestId and userId are in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, type AppErrorCode, type AppErrorDetail } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';
import { SENSITIVE_LOG_KEYS } from '../logger/logger';

export type ErrorResponseBody = {
  error: {
    code: number;
    message: string;
    type: AppErrorCode;
    details: AppErrorDetail[];
  };
};

/** AppError.meta is nested one level down, out of reach of the logger's top-level redaction. */
export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_LOG_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function send(
  reply: FastifyReply,
  status: number,
  type: AppErrorCode,
  message: string,
  details: AppErrorDetail[] = [],
) {
  if (status === 401) reply.header('WWW-Authenticate', 'Bearer');

  const body: ErrorResponseBody = { error: { code: status, message, type, details } };
  return reply.status(status).send(body);
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return send(reply, err.status, err.code, err.message, err.details);
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return send(reply, 429, 'RATE_LIMITED', 'Too many requests. Try again later.');
    }

    // 3) Framework-level client errors (body parsing, content type, size limits)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      const type: AppErrorCode = err.statusCode === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST';
      return send(reply, err.statusCode, type, err.message);
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return send(reply, 500, 'INTERNAL', 'Internal server error');
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });
    return send(reply, 404, 'NOT_FOUND', `Route ${req.method} ${req.url} not found`);
  });
}
