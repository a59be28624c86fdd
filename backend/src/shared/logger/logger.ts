/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One Winston logger for the process, JSON lines with stable metadata
 *   (service, env) on every entry.
 * - Credentials must never reach a log sink. The redact format masks known
 *   secret-bearing keys (tokens, secrets, Authorization) at any call site.
 *
 * HOW TO USE:
 * - Import `logger` anywhere outside a request; inside handlers prefer
 *   `withRequestContext(req)`.
 * - Pass errors as `{ err }`; the errors format keeps message and stack.
 * - configureLogger(config) once at startup applies LOG_LEVEL / SERVICE_NAME.
 */

import winston from 'winston';

const REDACTED = '[REDACTED]';

export const SENSITIVE_LOG_KEYS: ReadonlySet<string> = new Set([
  'token',
  'accessToken',
  'access_token',
  'idToken',
  'id_token',
  'authorization',
  'secret',
  'secretKey',
  'password',
]);

export const redactSensitive = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_LOG_KEYS.has(key)) info[key] = REDACTED;
  }
  return info;
});

export type LoggerOptions = {
  level: string;
  service: string;
  env: string;
  silent?: boolean;
};

export function createAppLogger(opts: LoggerOptions) {
  return winston.createLogger({
    level: opts.level,
    silent: opts.silent ?? false,
    format: winston.format.combine(
      redactSensitive(),
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: opts.service, env: opts.env },
    transports: [new winston.transports.Console()],
  });
}

export type Logger = winston.Logger;

// Import-time defaults so modules can log before config is parsed.
export const logger: Logger = createAppLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'baldness-api-backend',
  env: process.env.NODE_ENV ?? 'development',
});

export function configureLogger(config: { logLevel: string; serviceName: string; nodeEnv: string }): void {
  logger.level = config.logLevel;
  logger.defaultMeta = { service: config.serviceName, env: config.nodeEnv };
}
