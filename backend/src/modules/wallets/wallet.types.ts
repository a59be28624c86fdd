/**
 * src/modules/wallets/wallet.types.ts
 *
 * WHY:
 * - Outcome of one provisioning attempt. The provisioner reports instead of
 *   throwing; the work queue decides whether a failure is retried.
 */

export type ProvisionOutcome =
  | { status: 'assigned'; userId: number; walletAddress: string }
  | { status: 'already_assigned'; userId: number; walletAddress: string }
  | { status: 'user_not_found'; userId: number }
  | { status: 'failed'; userId: number; error: Error };

export const WALLET_ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
