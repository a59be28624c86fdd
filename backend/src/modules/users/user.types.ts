/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user. A Google subject id maps to at most one user.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

export type UserId = number;

/** Column widths of the users table. */
export const USER_FIELD_LIMITS = {
  email: 255,
  name: 255,
  picture: 1024,
} as const;

export type User = {
  id: UserId;
  email: string;
  name: string;
  picture: string | null;
  googleId: string | null;
  walletAddress: string | null;
  createdAt: Date;
};

/**
 * Identity claims asserted by a credential verifier.
 * subjectId is the Google `sub`; null for the email path.
 */
export type IdentityClaims = {
  email: string;
  name: string;
  picture: string | null;
  subjectId: string | null;
};

export type FindOrCreateResult = {
  user: User;
  isNew: boolean;
};

export type WalletAssignmentResult = {
  /** false when the user already had an address (the existing one is kept). */
  updated: boolean;
  walletAddress: string;
};
