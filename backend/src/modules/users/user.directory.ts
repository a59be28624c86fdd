/**
 * backend/src/modules/users/user.directory.ts
 *
 * WHY:
 * - Single owner of the "one user per identity" rules:
 *   - Google path: subject id first, then email.
 *   - Email path: email only.
 * - Single owner of the wallet immutability rule (set once, never overwritten).
 *
 * RULES:
 * - No HTTP here. Throws AppError via UserErrors for client-facing failures.
 * - No explicit locks: races on first login are settled by the store's unique
 *   constraints. A UniqueViolationError on insert means "someone else just
 *   created it": re-fetch and continue as an existing user.
 * - Never clears a Google link; never overwrites a wallet address.
 */

import type { Logger } from '../../shared/logger/logger';
import { emailDomain } from '../../shared/logger/with-context';
import { AppError } from '../../shared/http/errors';
import { UniqueViolationError, type UserProfilePatch, type UserStore } from './dal/user.store';
import { UserErrors } from './user.errors';
import type {
  FindOrCreateResult,
  IdentityClaims,
  User,
  UserId,
  WalletAssignmentResult,
} from './user.types';

export class UserDirectory {
  constructor(
    private readonly deps: {
      store: UserStore;
      logger: Logger;
    },
  ) {}

  async findOrCreate(claims: IdentityClaims): Promise<FindOrCreateResult> {
    const existing = await this.lookup(claims);
    if (existing) {
      return { user: await this.refresh(existing, claims), isNew: false };
    }

    try {
      const user = await this.deps.store.insert({
        email: claims.email,
        name: claims.name,
        picture: claims.picture,
        googleId: claims.subjectId,
      });

      this.deps.logger.info('users.created', {
        flow: 'users.find_or_create',
        userId: user.id,
        emailDomain: emailDomain(user.email),
        provider: claims.subjectId ? 'google' : 'email',
      });

      return { user, isNew: true };
    } catch (err) {
      if (!(err instanceof UniqueViolationError)) throw err;

      // Lost a race against a concurrent first login for the same identity.
      const raced = await this.lookup(claims);
      if (!raced) throw err;

      this.deps.logger.info('users.create_race_resolved', {
        flow: 'users.find_or_create',
        userId: raced.id,
        column: err.column,
      });

      return { user: await this.refresh(raced, claims), isNew: false };
    }
  }

  async updateWalletAddress(userId: UserId, address: string): Promise<WalletAssignmentResult> {
    let updated: User | undefined;
    try {
      updated = await this.deps.store.setWalletAddressIfEmpty(userId, address);
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        throw UserErrors.walletAddressTaken({ userId });
      }
      throw err;
    }

    if (updated) {
      return { updated: true, walletAddress: address };
    }

    const current = await this.deps.store.findById(userId);
    if (!current) throw UserErrors.notFound({ userId });

    if (current.walletAddress === null) {
      throw AppError.internal('Wallet address update was not applied', { userId });
    }

    this.deps.logger.info('users.wallet_address_kept', {
      flow: 'users.update_wallet_address',
      userId,
    });

    return { updated: false, walletAddress: current.walletAddress };
  }

  async findById(userId: UserId): Promise<User | undefined> {
    return this.deps.store.findById(userId);
  }

  async getById(userId: UserId): Promise<User> {
    const user = await this.deps.store.findById(userId);
    if (!user) throw UserErrors.notFound({ userId });
    return user;
  }

  async getByWalletAddress(address: string): Promise<User> {
    const user = await this.deps.store.findByWalletAddress(address);
    if (!user) throw UserErrors.notFound({ walletAddress: address });
    return user;
  }

  private async lookup(claims: IdentityClaims): Promise<User | undefined> {
    if (claims.subjectId) {
      const bySubject = await this.deps.store.findByGoogleId(claims.subjectId);
      if (bySubject) return bySubject;
    }
    return this.deps.store.findByEmail(claims.email);
  }

  private async refresh(user: User, claims: IdentityClaims): Promise<User> {
    if (claims.subjectId && user.googleId && user.googleId !== claims.subjectId) {
      throw UserErrors.identityConflict({ userId: user.id });
    }

    const patch: UserProfilePatch = { name: claims.name };
    if (claims.picture !== null) patch.picture = claims.picture;
    if (claims.subjectId && !user.googleId) patch.googleId = claims.subjectId;

    let updated: User | undefined;
    try {
      updated = await this.deps.store.updateProfile(user.id, patch);
    } catch (err) {
      if (err instanceof UniqueViolationError && err.column === 'google_id') {
        throw UserErrors.identityConflict({ userId: user.id });
      }
      throw err;
    }

    if (!updated) throw UserErrors.notFound({ userId: user.id });
    return updated;
  }
}
