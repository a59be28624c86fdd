/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + userId so we can trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export function withRequestContext(req: FastifyRequest) {
  // Requests rejected before onRequest ran have no context yet.
  const log = req.requestContext?.logger ?? logger;

  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
    userId: req.authContext?.userId ?? null,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => log.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => log.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => log.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => log.debug(msg, { ...base, ...meta }),
  };
}

/** PII-safe: operational logs carry the email domain, never the full address. */
export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
