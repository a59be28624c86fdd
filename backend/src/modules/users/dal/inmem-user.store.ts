/**
 * backend/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - In-process UserStore for tests: no Postgres required.
 * - Mirrors the Postgres constraints (unique email / google_id / wallet_address,
 *   identity ids starting at 1) so directory logic is exercised the same way.
 *
 * RULES:
 * - Implements UserStore only.
 * - Returns copies; callers can never mutate stored rows.
 * - JavaScript is single-threaded, so the maps are safe without locks.
 */

import type { User, UserId } from '../user.types';
import {
  UniqueViolationError,
  type NewUser,
  type UniqueColumn,
  type UserProfilePatch,
  type UserStore,
} from './user.store';

export class InMemUserStore implements UserStore {
  private readonly rows = new Map<UserId, User>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  private find(predicate: (u: User) => boolean): User | undefined {
    for (const u of this.rows.values()) {
      if (predicate(u)) return { ...u };
    }
    return undefined;
  }

  private assertUnique(column: UniqueColumn, value: string | null, exceptId?: UserId): void {
    if (value === null) return;

    const taken = this.find((u) => {
      if (u.id === exceptId) return false;
      if (column === 'email') return u.email === value;
      if (column === 'google_id') return u.googleId === value;
      return u.walletAddress === value;
    });

    if (taken) throw new UniqueViolationError(column);
  }

  findById(id: UserId): Promise<User | undefined> {
    const row = this.rows.get(id);
    return Promise.resolve(row ? { ...row } : undefined);
  }

  findByEmail(email: string): Promise<User | undefined> {
    const normalized = email.toLowerCase();
    return Promise.resolve(this.find((u) => u.email === normalized));
  }

  findByGoogleId(googleId: string): Promise<User | undefined> {
    return Promise.resolve(this.find((u) => u.googleId === googleId));
  }

  findByWalletAddress(address: string): Promise<User | undefined> {
    return Promise.resolve(this.find((u) => u.walletAddress === address));
  }

  insert(user: NewUser): Promise<User> {
    const email = user.email.toLowerCase();

    try {
      this.assertUnique('email', email);
      this.assertUnique('google_id', user.googleId);
    } catch (err) {
      return Promise.reject(err);
    }

    const row: User = {
      id: this.nextId++,
      email,
      name: user.name,
      picture: user.picture,
      googleId: user.googleId,
      walletAddress: null,
      createdAt: this.now(),
    };
    this.rows.set(row.id, row);

    return Promise.resolve({ ...row });
  }

  updateProfile(id: UserId, patch: UserProfilePatch): Promise<User | undefined> {
    const row = this.rows.get(id);
    if (!row) return Promise.resolve(undefined);

    if (patch.googleId !== undefined) {
      try {
        this.assertUnique('google_id', patch.googleId, id);
      } catch (err) {
        return Promise.reject(err);
      }
    }

    const next: User = {
      ...row,
      name: patch.name,
      picture: patch.picture !== undefined ? patch.picture : row.picture,
      googleId: patch.googleId !== undefined ? patch.googleId : row.googleId,
    };
    this.rows.set(id, next);

    return Promise.resolve({ ...next });
  }

  setWalletAddressIfEmpty(id: UserId, address: string): Promise<User | undefined> {
    const row = this.rows.get(id);
    if (!row || row.walletAddress !== null) return Promise.resolve(undefined);

    try {
      this.assertUnique('wallet_address', address, id);
    } catch (err) {
      return Promise.reject(err);
    }

    const next: User = { ...row, walletAddress: address };
    this.rows.set(id, next);

    return Promise.resolve({ ...next });
  }

  /** Test helper: number of stored users. */
  count(): number {
    return this.rows.size;
  }
}
