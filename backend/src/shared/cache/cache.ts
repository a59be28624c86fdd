/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting state must be fast and externalized (shared across instances).
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface Cache {
  /**
   * Atomically increment a counter and ensure it expires.
   * The TTL is applied when the counter is created; later hits do not extend it.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  close(): Promise<void>;
}
