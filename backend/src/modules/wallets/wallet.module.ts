/**
 * src/modules/wallets/wallet.module.ts
 *
 * WHY:
 * - Encapsulates Wallets module wiring.
 * - No routes: wallets are created by the work queue, never over HTTP.
 *
 * RULES:
 * - No infra creation here (DI passes the provider in).
 */

import type { Logger } from '../../shared/logger/logger';
import type { WalletProvisionMessage } from '../../shared/messaging/queue';
import type { UserDirectory } from '../users/user.directory';
import type { WalletProvider } from './providers/wallet-provider';
import { WalletProvisioner, createWalletProvisionHandler } from './wallet.provisioner';

export type WalletModule = ReturnType<typeof createWalletModule>;

export function createWalletModule(deps: {
  directory: UserDirectory;
  provider: WalletProvider;
  logger: Logger;
}) {
  const provisioner = new WalletProvisioner(deps);
  const handleProvision: (message: WalletProvisionMessage) => Promise<void> =
    createWalletProvisionHandler(provisioner);

  return {
    provider: deps.provider,
    provisioner,
    handleProvision,
  };
}
