/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static registry of migrations, so the runner works the same from src (tsx)
 *   and from dist (node) without scanning the filesystem.
 *
 * RULES:
 * - Append only. Names sort lexicographically in apply order.
 */

import type { Migration } from 'kysely';
import * as m0001 from './0001_users';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
};
