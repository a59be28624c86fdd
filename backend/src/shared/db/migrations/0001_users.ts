/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - One row per authenticated identity.
 * - email is the primary identity key; google_id links the Google subject.
 * - wallet_address is filled once by the wallet provisioner.
 *
 * RULES:
 * - Uniqueness is enforced here; the user directory relies on it to settle
 *   concurrent first logins (unique_violation => re-fetch).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'integer', (col) => col.primaryKey().generatedAlwaysAsIdentity())
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('name', 'varchar(255)', (col) => col.notNull())
    .addColumn('picture', 'varchar(1024)')
    .addColumn('google_id', 'varchar(255)', (col) => col.unique())
    .addColumn('wallet_address', 'varchar(255)', (col) => col.unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('users_wallet_address_idx')
    .on('users')
    .column('wallet_address')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
