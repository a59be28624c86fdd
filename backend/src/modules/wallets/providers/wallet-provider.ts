/**
 * src/modules/wallets/providers/wallet-provider.ts
 *
 * WHY:
 * - The embedded-wallet vendor is a swappable adapter (DIP).
 * - di.ts picks the implementation from config (thirdweb | deterministic).
 */

export interface WalletProvider {
  readonly name: string;

  /**
   * Creates (or returns the existing) wallet for this user on the vendor side.
   * Resolves with the public address. Rejects with WalletProviderError.
   */
  createWallet(userId: number): Promise<string>;
}

export class WalletProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'WalletProviderError';
  }
}
