/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - new InMemCache(() => fakeNowMs) to control expiry in tests
 */

import type { Cache } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as the Redis adapter: TTL is set on creation only (fixed window).
    const expiresAtMs = entry
      ? entry.expiresAtMs
      : opts?.ttlSeconds
        ? this.now() + opts.ttlSeconds * 1000
        : null;

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  close(): Promise<void> {
    this.store.clear();
    return Promise.resolve();
  }
}
