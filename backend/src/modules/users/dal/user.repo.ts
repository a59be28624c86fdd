/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Postgres adapter for the UserStore port.
 * - Writes live here; reads delegate to user.query-sql.ts.
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No AppError.
 * - No policies.
 * - Postgres unique_violation (23505) is translated to UniqueViolationError.
 */

import pg from 'pg';
import type { DbExecutor } from '../../../shared/db/db';
import { PG_UNIQUE_VIOLATION } from '../../../shared/db/db';
import type { User, UserId } from '../user.types';
import {
  selectUserByEmailSql,
  selectUserByGoogleIdSql,
  selectUserByIdSql,
  selectUserByWalletAddressSql,
  type UserRow,
} from './user.query-sql';
import {
  UniqueViolationError,
  type NewUser,
  type UniqueColumn,
  type UserProfilePatch,
  type UserStore,
} from './user.store';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    picture: row.picture ?? null,
    googleId: row.google_id ?? null,
    walletAddress: row.wallet_address ?? null,
    createdAt: row.created_at,
  };
}

const CONSTRAINT_COLUMNS: ReadonlyArray<UniqueColumn> = ['wallet_address', 'google_id', 'email'];

function columnFromConstraint(constraint: string | undefined): UniqueColumn | null {
  if (!constraint) return null;
  return CONSTRAINT_COLUMNS.find((c) => constraint.includes(c)) ?? null;
}

function translateError(err: unknown): unknown {
  if (err instanceof pg.DatabaseError && err.code === PG_UNIQUE_VIOLATION) {
    return new UniqueViolationError(columnFromConstraint(err.constraint));
  }
  return err;
}

export class UserRepo implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: UserId): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, id);
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    return row ? toUser(row) : undefined;
  }

  async findByGoogleId(googleId: string): Promise<User | undefined> {
    const row = await selectUserByGoogleIdSql(this.db, googleId);
    return row ? toUser(row) : undefined;
  }

  async findByWalletAddress(address: string): Promise<User | undefined> {
    const row = await selectUserByWalletAddressSql(this.db, address);
    return row ? toUser(row) : undefined;
  }

  async insert(user: NewUser): Promise<User> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          email: user.email.toLowerCase(),
          name: user.name,
          picture: user.picture,
          google_id: user.googleId,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toUser(row);
    } catch (err) {
      throw translateError(err);
    }
  }

  async updateProfile(id: UserId, patch: UserProfilePatch): Promise<User | undefined> {
    try {
      const row = await this.db
        .updateTable('users')
        .set({
          name: patch.name,
          ...(patch.picture !== undefined ? { picture: patch.picture } : {}),
          ...(patch.googleId !== undefined ? { google_id: patch.googleId } : {}),
        })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return row ? toUser(row) : undefined;
    } catch (err) {
      throw translateError(err);
    }
  }

  async setWalletAddressIfEmpty(id: UserId, address: string): Promise<User | undefined> {
    try {
      const row = await this.db
        .updateTable('users')
        .set({ wallet_address: address })
        .where('id', '=', id)
        .where('wallet_address', 'is', null)
        .returningAll()
        .executeTakeFirst();

      return row ? toUser(row) : undefined;
    } catch (err) {
      throw translateError(err);
    }
  }
}
