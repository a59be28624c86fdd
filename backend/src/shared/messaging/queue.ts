/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this user needs a wallet" from "here is how wallets get made".
 * - The auth flow enqueues a message and returns; a worker does the slow,
 *   failure-prone third-party call outside the request/response lifecycle.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Never put tokens or secrets in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type WalletProvisionMessage = {
  type: 'wallet.provision';
  userId: number;
  /** Request that triggered the job, for log correlation. */
  requestId: string | null;
};

// Union: add new message types here.
export type QueueMessage = WalletProvisionMessage;

export type QueueMessageType = QueueMessage['type'];

export type QueueHandlers = {
  [K in QueueMessageType]: (message: Extract<QueueMessage, { type: K }>) => Promise<void>;
};

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  /**
   * Accepts a message for background processing.
   * Resolves once accepted (not once processed).
   * Rejects with QueueFullError / QueueClosedError when not accepted.
   */
  enqueue(message: QueueMessage): Promise<void>;
}

export class QueueFullError extends Error {
  constructor(public readonly capacity: number) {
    super(`Queue is full (capacity ${capacity})`);
    this.name = 'QueueFullError';
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}
