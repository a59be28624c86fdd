/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never say which check failed. The reason goes to
 *   meta, which is logged (redacted) and never returned.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Google rejected the token, was unreachable, or returned something unexpected. */
  authenticationFailed(meta?: AppErrorMeta) {
    return new AppError({
      code: 'AUTHENTICATION_FAILED',
      status: 401,
      message: 'Could not verify Google credentials.',
      meta,
    });
  },

  emailLoginDisabled(meta?: AppErrorMeta) {
    return AppError.forbidden('Email login is disabled.', meta);
  },

  /** Token is valid but its subject no longer resolves to a user. */
  unknownSubject(meta?: AppErrorMeta) {
    return AppError.unauthorized('User for this token does not exist.', meta);
  },
};
