/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users module is a support module (no routes of its own).
 *   Auth and wallets consume its directory.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { UserStore } from './dal/user.store';
import { UserDirectory } from './user.directory';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { store: UserStore; logger: Logger }) {
  const directory = new UserDirectory({ store: deps.store, logger: deps.logger });

  return {
    store: deps.store,
    directory,
  };
}
