/**
 * backend/src/modules/users/dal/user.store.ts
 *
 * WHY:
 * - The user directory depends on this port, not on Kysely.
 * - Production: UserRepo (Postgres). Tests: InMemUserStore.
 *
 * RULES:
 * - Emails are normalized to lowercase by every adapter.
 * - Uniqueness (email, google_id, wallet_address) is the adapter's job and
 *   surfaces as UniqueViolationError, never as a driver-specific error.
 * - No AppError here. No policies.
 */

import type { User, UserId } from '../user.types';

export type NewUser = {
  email: string;
  name: string;
  picture: string | null;
  googleId: string | null;
};

/**
 * Fields refreshed on repeated logins.
 * - picture: undefined = keep current value.
 * - googleId: undefined = keep current value (we never clear a link).
 */
export type UserProfilePatch = {
  name: string;
  picture?: string | null;
  googleId?: string;
};

export type UniqueColumn = 'email' | 'google_id' | 'wallet_address';

export class UniqueViolationError extends Error {
  constructor(public readonly column: UniqueColumn | null) {
    super(`Unique constraint violated${column ? ` on ${column}` : ''}`);
    this.name = 'UniqueViolationError';
  }
}

export interface UserStore {
  findById(id: UserId): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  findByGoogleId(googleId: string): Promise<User | undefined>;
  findByWalletAddress(address: string): Promise<User | undefined>;

  /** Throws UniqueViolationError when email or google_id is taken. */
  insert(user: NewUser): Promise<User>;

  /** Returns undefined when the user does not exist. */
  updateProfile(id: UserId, patch: UserProfilePatch): Promise<User | undefined>;

  /**
   * Conditional write: only succeeds while wallet_address IS NULL.
   * Returns the updated user, or undefined when nothing was written
   * (unknown id or address already present).
   * Throws UniqueViolationError when the address belongs to another user.
   */
  setWalletAddressIfEmpty(id: UserId, address: string): Promise<User | undefined>;
}
