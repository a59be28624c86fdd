/**
 * src/modules/wallets/wallet.provisioner.ts
 *
 * WHY:
 * - Gives a freshly created user an embedded wallet, outside the login request.
 * - provision() reports an outcome instead of throwing, so callers (the queue
 *   handler, tests, a future backfill script) decide what a failure means.
 *
 * RULES:
 * - The vendor is called before the directory: if the user vanished in between,
 *   the vendor-side wallet is orphaned but harmless (keyed by user id).
 * - A wallet address is assigned at most once. A concurrent assignment is
 *   reported as already_assigned and the first address stays.
 */

import type { Logger } from '../../shared/logger/logger';
import { AppError } from '../../shared/http/errors';
import type { UserDirectory } from '../users/user.directory';
import type { WalletProvider } from './providers/wallet-provider';
import type { ProvisionOutcome } from './wallet.types';

export class WalletProvisioner {
  constructor(
    private readonly deps: {
      directory: UserDirectory;
      provider: WalletProvider;
      logger: Logger;
    },
  ) {}

  async provision(userId: number, meta: { requestId?: string | null } = {}): Promise<ProvisionOutcome> {
    const flow = 'wallet.provision';
    const base = { flow, userId, provider: this.deps.provider.name, requestId: meta.requestId ?? null };

    try {
      const user = await this.deps.directory.findById(userId);
      if (!user) {
        this.deps.logger.warn('wallet.provision.user_not_found', base);
        return { status: 'user_not_found', userId };
      }

      if (user.walletAddress) {
        this.deps.logger.info('wallet.provision.already_assigned', base);
        return { status: 'already_assigned', userId, walletAddress: user.walletAddress };
      }

      const address = await this.deps.provider.createWallet(userId);
      const result = await this.deps.directory.updateWalletAddress(userId, address);

      if (!result.updated) {
        this.deps.logger.info('wallet.provision.already_assigned', base);
        return { status: 'already_assigned', userId, walletAddress: result.walletAddress };
      }

      this.deps.logger.info('wallet.provision.assigned', base);
      return { status: 'assigned', userId, walletAddress: result.walletAddress };
    } catch (err) {
      if (err instanceof AppError && err.code === 'NOT_FOUND') {
        this.deps.logger.warn('wallet.provision.user_not_found', base);
        return { status: 'user_not_found', userId };
      }

      const error = err instanceof Error ? err : new Error(String(err));
      this.deps.logger.error('wallet.provision.failed', { ...base, message: error.message });
      return { status: 'failed', userId, error };
    }
  }
}

/**
 * Queue handler for `wallet.provision`.
 * Rethrows failed outcomes so the work queue applies its retry policy.
 */
export function createWalletProvisionHandler(provisioner: WalletProvisioner) {
  return async (message: { userId: number; requestId: string | null }): Promise<void> => {
    const outcome = await provisioner.provision(message.userId, { requestId: message.requestId });
    if (outcome.status === 'failed') throw outcome.error;
  };
}
