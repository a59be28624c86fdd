/**
 * WHY:
 * - In-process stand-ins for the third parties behind our ports
 *   (Google, the wallet vendor). No network in tests.
 */

import type { GoogleIdentityVerifier } from '../../src/modules/auth/credentials/google-identity.verifier';
import { AuthErrors } from '../../src/modules/auth/auth.errors';
import type { IdentityClaims } from '../../src/modules/users/user.types';
import {
  WalletProviderError,
  type WalletProvider,
} from '../../src/modules/wallets/providers/wallet-provider';

export class FakeGoogleVerifier implements GoogleIdentityVerifier {
  private readonly accounts = new Map<string, IdentityClaims>();
  readonly calls: Array<{ accessToken: string; idToken?: string }> = [];

  /** Registers an access token that Google would accept. */
  accept(accessToken: string, claims: Omit<IdentityClaims, 'picture'> & { picture?: string | null }) {
    this.accounts.set(accessToken, { ...claims, picture: claims.picture ?? null });
  }

  verify(input: { accessToken: string; idToken?: string }): Promise<IdentityClaims> {
    this.calls.push(input);
    const claims = this.accounts.get(input.accessToken);
    if (!claims) return Promise.reject(AuthErrors.authenticationFailed({ reason: 'unknown_token' }));
    return Promise.resolve({ ...claims });
  }
}

export class FakeWalletProvider implements WalletProvider {
  readonly name = 'fake';
  readonly calls: number[] = [];
  private failuresLeft = 0;

  /** Fails the next `times` calls (Infinity: always unreachable). */
  failNext(times: number): void {
    this.failuresLeft = times;
  }

  createWallet(userId: number): Promise<string> {
    this.calls.push(userId);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return Promise.reject(new WalletProviderError('connect ECONNREFUSED', this.name));
    }
    return Promise.resolve(fakeWalletAddress(userId));
  }
}

export function fakeWalletAddress(userId: number): string {
  return `0x${userId.toString(16).padStart(40, 'a')}`;
}
