/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for rate limiting.
 *
 * IMPORTANT:
 * - Importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 *
 * LOGGING:
 * - Connection events fire outside any request, so they go to the logger
 *   handed to connect(), not withRequestContext().
 *
 * RULES:
 * - Fixed window: the TTL is set when the counter is created and never extended.
 */

import { createClient } from 'redis';
import type { Cache } from './cache';
import { logger as defaultLogger, type Logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string, logger: Logger = defaultLogger): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('reconnecting', () => {
      logger.warn('redis.reconnecting', { flow: 'redis' });
    });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    logger.info('redis.connected', { flow: 'redis' });
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }
}
