/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perIp: { limit: 20, windowSeconds: 900 },
    perEmail: { limit: 10, windowSeconds: 900 },
  },
} as const;
