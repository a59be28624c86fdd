/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, work queue) and shares them safely.
 * - Keeps modules testable: every port can be replaced through `overrides`
 *   (tests pass in-process stand-ins, never real Postgres/Redis/HTTP).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import { SessionTokenIssuer } from '../shared/security/session-token';

import { logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { WorkQueue } from '../shared/messaging/work-queue';
import type { Queue } from '../shared/messaging/queue';

import { UserRepo } from '../modules/users/dal/user.repo';
import type { UserStore } from '../modules/users/dal/user.store';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createWalletProvider } from '../modules/wallets/providers/create-wallet-provider';
import type { WalletProvider } from '../modules/wallets/providers/wallet-provider';
import { createWalletModule } from '../modules/wallets/wallet.module';
import type { WalletModule } from '../modules/wallets/wallet.module';

import {
  HttpGoogleIdentityVerifier,
  type GoogleIdentityVerifier,
} from '../modules/auth/credentials/google-identity.verifier';
import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { SimulatedBaldnessDetector } from '../modules/detector/simulated-baldness.detector';
import type { BaldnessDetector } from '../modules/detector/detector.types';
import { createDetectorModule } from '../modules/detector/detector.module';
import type { DetectorModule } from '../modules/detector/detector.module';

/** Ports that tests (or alternative deployments) may replace. */
export type DepsOverrides = {
  userStore?: UserStore;
  cache?: Cache;
  queue?: Queue;
  googleVerifier?: GoogleIdentityVerifier;
  walletProvider?: WalletProvider;
  detector?: BaldnessDetector;
  logger?: Logger;
  now?: () => Date;
};

export type AppDeps = {
  db: Db | null;
  cache: Cache;
  logger: Logger;

  rateLimiter: RateLimiter;
  sessionTokens: SessionTokenIssuer;

  // messaging
  queue: Queue;

  // modules
  users: UserModule;
  wallets: WalletModule;
  auth: AuthModule;
  detector: DetectorModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const logger = overrides.logger ?? defaultLogger;

  // Postgres only when no store is injected.
  let db: Db | null = null;
  let userStore: UserStore;
  if (overrides.userStore) {
    userStore = overrides.userStore;
  } else {
    db = createDb(config.databaseUrl);
    userStore = new UserRepo(db);
  }

  // Redis is mandatory outside tests.
  const cache: Cache = overrides.cache ?? (await RedisCache.connect(config.redisUrl, logger));

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionTokens = new SessionTokenIssuer({
    secret: config.jwt.secretKey,
    algorithm: config.jwt.algorithm,
    ttlSeconds: config.jwt.expirationHours * 3600,
    now: overrides.now,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ store: userStore, logger });

  const wallets = createWalletModule({
    directory: users.directory,
    provider: overrides.walletProvider ?? createWalletProvider(config.wallet),
    logger,
  });

  let workQueue: WorkQueue | null = null;
  let queue: Queue;
  if (overrides.queue) {
    queue = overrides.queue;
  } else {
    workQueue = new WorkQueue({
      handlers: { 'wallet.provision': wallets.handleProvision },
      capacity: config.wallet.queueCapacity,
      maxAttempts: config.wallet.maxAttempts,
      retryDelayMs: config.wallet.retryDelayMs,
      logger,
    });
    queue = workQueue;
  }

  const auth = createAuthModule({
    directory: users.directory,
    googleVerifier:
      overrides.googleVerifier ??
      HttpGoogleIdentityVerifier.create({
        clientId: config.google.clientId,
        timeoutMs: config.google.httpTimeoutMs,
      }),
    sessionTokens,
    queue,
    rateLimiter,
    emailKeyHasher: new HmacSha256KeyedHasher(config.appSecretKey),
    logger,
    emailLoginEnabled: config.emailLoginEnabled,
  });

  const detector = createDetectorModule({
    detector: overrides.detector ?? new SimulatedBaldnessDetector(),
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    sessionTokens,
    queue,
    users,
    wallets,
    auth,
    detector,
    close: async () => {
      // Finish in-flight wallet jobs before their dependencies go away.
      if (workQueue) await workQueue.close();
      await cache.close();
      if (db) await db.destroy();
    },
  };
}
