/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its error semantics (lookup misses, identity conflicts).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put raw emails into messages; meta is logged redacted.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  /** The email is already linked to a different Google account. */
  identityConflict(meta?: AppErrorMeta) {
    return AppError.conflict('This email is linked to a different Google account.', meta);
  },

  /** The wallet address is already assigned to another user. */
  walletAddressTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Wallet address is already assigned to another user.', meta);
  },
} as const;
