/**
 * src/modules/wallets/providers/deterministic-wallet.provider.ts
 *
 * WHY:
 * - Local development without vendor credentials.
 * - Same user id → same address, so restarts and retries stay consistent.
 *
 * RULES:
 * - Never wired in production (config defaults to thirdweb there).
 * - address = "0x" + first 40 hex chars of sha256("wallet_<userId>")
 */

import { createHash } from 'node:crypto';
import type { WalletProvider } from './wallet-provider';

export function deterministicWalletAddress(userId: number): string {
  const digest = createHash('sha256').update(`wallet_${userId}`).digest('hex');
  return `0x${digest.slice(0, 40)}`;
}

export class DeterministicWalletProvider implements WalletProvider {
  readonly name = 'deterministic';

  createWallet(userId: number): Promise<string> {
    return Promise.resolve(deterministicWalletAddress(userId));
  }
}
