/**
 * src/modules/wallets/providers/thirdweb-wallet.provider.ts
 *
 * WHY:
 * - Production wallet vendor: thirdweb server wallets over its HTTP API.
 * - One wallet per user, keyed by a stable identifier ("user-<id>"), so a
 *   retried call after a timeout returns the same wallet instead of a new one.
 *
 * RULES:
 * - The secret key travels in a header only; it is never logged.
 * - Any transport error, non-2xx, or unexpected body → WalletProviderError.
 * - The response is validated with Zod before an address leaves this file.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { WALLET_ADDRESS_PATTERN } from '../wallet.types';
import { WalletProviderError, type WalletProvider } from './wallet-provider';

const CreateServerWalletResponseSchema = z.object({
  result: z.object({
    address: z.string().regex(WALLET_ADDRESS_PATTERN),
  }),
});

export type ThirdwebWalletProviderOptions = {
  apiUrl: string;
  secretKey: string;
  clientId: string | null;
  timeoutMs: number;
};

export function walletIdentifier(userId: number): string {
  return `user-${userId}`;
}

export function createThirdwebHttpClient(opts: ThirdwebWalletProviderOptions): AxiosInstance {
  const headers: Record<string, string> = { 'x-secret-key': opts.secretKey };
  if (opts.clientId) headers['x-client-id'] = opts.clientId;

  return axios.create({
    baseURL: opts.apiUrl,
    timeout: opts.timeoutMs,
    headers,
  });
}

export class ThirdwebWalletProvider implements WalletProvider {
  readonly name = 'thirdweb';

  constructor(private readonly http: AxiosInstance) {}

  static create(opts: ThirdwebWalletProviderOptions): ThirdwebWalletProvider {
    return new ThirdwebWalletProvider(createThirdwebHttpClient(opts));
  }

  async createWallet(userId: number): Promise<string> {
    let body: unknown;
    try {
      const res = await this.http.post<unknown>('/v1/wallets/server', {
        identifier: walletIdentifier(userId),
      });
      body = res.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status ?? null;
        throw new WalletProviderError(
          status ? `thirdweb responded with ${status}` : `thirdweb request failed: ${err.message}`,
          this.name,
          status,
        );
      }
      throw new WalletProviderError(
        `thirdweb request failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
      );
    }

    const parsed = CreateServerWalletResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new WalletProviderError('thirdweb returned an unexpected response', this.name);
    }

    return parsed.data.result.address;
  }
}
