/**
 * src/modules/wallets/providers/create-wallet-provider.ts
 *
 * WHY:
 * - Maps config.wallet.provider to an adapter. Called from di.ts only.
 */

import type { AppConfig } from '../../../app/config';
import { DeterministicWalletProvider } from './deterministic-wallet.provider';
import { ThirdwebWalletProvider } from './thirdweb-wallet.provider';
import type { WalletProvider } from './wallet-provider';

export function createWalletProvider(config: AppConfig['wallet']): WalletProvider {
  switch (config.provider) {
    case 'deterministic':
      return new DeterministicWalletProvider();
    case 'thirdweb':
      if (!config.thirdwebSecretKey) {
        throw new Error('THIRDWEB_SECRET_KEY is required when WALLET_PROVIDER=thirdweb');
      }
      return ThirdwebWalletProvider.create({
        apiUrl: config.thirdwebApiUrl,
        secretKey: config.thirdwebSecretKey,
        clientId: config.thirdwebClientId,
        timeoutMs: config.httpTimeoutMs,
      });
  }
}
