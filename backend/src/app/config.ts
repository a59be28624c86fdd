/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The parsed AppConfig is passed explicitly to buildDeps/buildServer.
 *   Components never read process.env themselves.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * RULES:
 * - Secrets have no defaults. Missing secrets fail at startup.
 * - DATABASE_URL wins over the DB_* parts when both are present.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('baldness-api-backend'),

    APP_SECRET_KEY: z.string().min(32, 'APP_SECRET_KEY must be at least 32 characters'),

    // Session tokens (JWT)
    JWT_SECRET_KEY: z.string().min(32, 'JWT_SECRET_KEY must be at least 32 characters'),
    JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
    JWT_EXPIRATION_HOURS: z.coerce.number().int().min(1).max(720).default(24),

    // Postgres
    DATABASE_URL: z.string().min(1).optional(),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().default(5432),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().default('baldness_detector'),

    REDIS_URL: z.string().min(1),

    // Google OAuth
    GOOGLE_OAUTH_CLIENT_ID: z.string().optional(),
    GOOGLE_OAUTH_CLIENT_SECRET: z.string().optional(),
    GOOGLE_HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

    // Wallet provisioning
    WALLET_PROVIDER: z.enum(['thirdweb', 'deterministic']).optional(),
    THIRDWEB_SECRET_KEY: z.string().optional(),
    THIRDWEB_CLIENT_ID: z.string().optional(),
    THIRDWEB_API_URL: z.string().url().default('https://api.thirdweb.com'),
    WALLET_HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
    WALLET_QUEUE_CAPACITY: z.coerce.number().int().min(1).max(10_000).default(100),
    WALLET_QUEUE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    WALLET_QUEUE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

    EMAIL_LOGIN_ENABLED: booleanFromEnv.default('true'),
    CORS_ORIGINS: z.string().default('*'),
    UPLOAD_MAX_BYTES: z.coerce
      .number()
      .int()
      .min(1024)
      .default(10 * 1024 * 1024),
  })
  .superRefine((env, ctx) => {
    if (!env.DATABASE_URL && !env.DB_PASSWORD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DB_PASSWORD'],
        message: 'DB_PASSWORD is required when DATABASE_URL is not set',
      });
    }

    const provider = env.WALLET_PROVIDER ?? defaultWalletProvider(env.NODE_ENV);
    if (provider === 'thirdweb' && !env.THIRDWEB_SECRET_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['THIRDWEB_SECRET_KEY'],
        message: 'THIRDWEB_SECRET_KEY is required when WALLET_PROVIDER=thirdweb',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type WalletProviderKind = 'thirdweb' | 'deterministic';
export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export type AppConfig = {
  nodeEnv: NodeEnv;
  host: string;
  port: number;

  logLevel: string;
  serviceName: string;

  appSecretKey: string;

  jwt: {
    secretKey: string;
    algorithm: JwtAlgorithm;
    expirationHours: number;
  };

  databaseUrl: string;
  redisUrl: string;

  google: {
    clientId: string | null;
    clientSecret: string | null;
    httpTimeoutMs: number;
  };

  wallet: {
    provider: WalletProviderKind;
    thirdwebSecretKey: string | null;
    thirdwebClientId: string | null;
    thirdwebApiUrl: string;
    httpTimeoutMs: number;
    queueCapacity: number;
    maxAttempts: number;
    retryDelayMs: number;
  };

  emailLoginEnabled: boolean;
  corsOrigins: string[] | '*';
  uploadMaxBytes: number;
};

function defaultWalletProvider(nodeEnv: NodeEnv): WalletProviderKind {
  return nodeEnv === 'production' ? 'thirdweb' : 'deterministic';
}

function emptyToNull(value: string | undefined): string | null {
  return value && value.trim() ? value : null;
}

function buildDatabaseUrl(parts: {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}): string {
  const user = encodeURIComponent(parts.user);
  const password = encodeURIComponent(parts.password);
  return `postgres://${user}:${password}@${parts.host}:${parts.port}/${parts.database}`;
}

export function parseCorsOrigins(raw: string): string[] | '*' {
  const trimmed = raw.trim();
  if (trimmed === '*') return '*';
  return trimmed
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const databaseUrl =
    parsed.DATABASE_URL ??
    buildDatabaseUrl({
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD ?? '',
      database: parsed.DB_NAME,
    });

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    appSecretKey: parsed.APP_SECRET_KEY,

    jwt: {
      secretKey: parsed.JWT_SECRET_KEY,
      algorithm: parsed.JWT_ALGORITHM,
      expirationHours: parsed.JWT_EXPIRATION_HOURS,
    },

    databaseUrl,
    redisUrl: parsed.REDIS_URL,

    google: {
      clientId: emptyToNull(parsed.GOOGLE_OAUTH_CLIENT_ID),
      clientSecret: emptyToNull(parsed.GOOGLE_OAUTH_CLIENT_SECRET),
      httpTimeoutMs: parsed.GOOGLE_HTTP_TIMEOUT_MS,
    },

    wallet: {
      provider: parsed.WALLET_PROVIDER ?? defaultWalletProvider(parsed.NODE_ENV),
      thirdwebSecretKey: emptyToNull(parsed.THIRDWEB_SECRET_KEY),
      thirdwebClientId: emptyToNull(parsed.THIRDWEB_CLIENT_ID),
      thirdwebApiUrl: parsed.THIRDWEB_API_URL,
      httpTimeoutMs: parsed.WALLET_HTTP_TIMEOUT_MS,
      queueCapacity: parsed.WALLET_QUEUE_CAPACITY,
      maxAttempts: parsed.WALLET_QUEUE_MAX_ATTEMPTS,
      retryDelayMs: parsed.WALLET_QUEUE_RETRY_DELAY_MS,
    },

    emailLoginEnabled: parsed.EMAIL_LOGIN_ENABLED,
    corsOrigins: parseCorsOrigins(parsed.CORS_ORIGINS),
    uploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
  };
}
