/**
 * backend/src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - Rate-limit counters are keyed per email, but raw emails must not end up in
 *   Redis keys or operational logs.
 * - HMAC-SHA256(email, APP_SECRET_KEY) adds a server-side pepper: the keys are
 *   stable for lookups yet cannot be reversed by dictionary without the secret.
 *
 * RULES:
 * - Deterministic: same (input, key) → same output (required for counter lookup).
 * - No I/O. No business logic.
 */

import { createHmac } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /** Returns HMAC-SHA256(value, key) as a lowercase hex string. */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('hex');
  }
}
