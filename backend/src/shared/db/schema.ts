/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - The schema is small and owned by our migrations, so we maintain it by hand
 *   next to them instead of running a codegen step.
 *
 * RULES:
 * - Keep aligned with src/shared/db/migrations (one change = both files).
 * - snake_case column names stay inside DAL code.
 */

import type { ColumnType, Generated } from 'kysely';

export interface UsersTable {
  id: Generated<number>;
  email: string;
  name: string;
  picture: string | null;
  google_id: string | null;
  wallet_address: string | null;
  created_at: ColumnType<Date, never, never>;
}

export interface DB {
  users: UsersTable;
}
