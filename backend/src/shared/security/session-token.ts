/**
 * backend/src/shared/security/session-token.ts
 *
 * WHY:
 * - Sessions are stateless bearer tokens (JWT, HMAC-signed). Nothing is stored
 *   server-side, so there is no revocation: a token dies at `exp`.
 * - One class owns both minting and validation so claims stay in sync.
 *
 * HOW TO USE:
 * - const issuer = new SessionTokenIssuer({ secret, algorithm: 'HS256', ttlSeconds: 86400 })
 * - const { token, expiresIn } = issuer.issue({ id: 1, email: 'a@b.com' })
 * - const { userId } = issuer.validate(token)   // throws SessionTokenError
 *
 * RULES:
 * - validity = signature verifies AND now < exp.
 * - `sub` is the user id as a decimal string. Anything else is malformed.
 * - No HTTP knowledge here; the bearer guard maps errors to AppError.
 * - Never log the raw token.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { JwtAlgorithm } from '../../app/config';

export type SessionTokenErrorReason = 'INVALID' | 'EXPIRED' | 'MALFORMED';

export class SessionTokenError extends Error {
  constructor(
    public readonly reason: SessionTokenErrorReason,
    message: string,
  ) {
    super(message);
    this.name = 'SessionTokenError';
  }
}

/** Signature does not verify (wrong key, tampered payload, wrong algorithm). */
export class InvalidTokenError extends SessionTokenError {
  constructor(message = 'Invalid token signature') {
    super('INVALID', message);
    this.name = 'InvalidTokenError';
  }
}

export class ExpiredTokenError extends SessionTokenError {
  constructor(public readonly expiredAt: Date) {
    super('EXPIRED', 'Token has expired');
    this.name = 'ExpiredTokenError';
  }
}

/** Not a JWT, or a JWT whose claims we do not recognize. */
export class MalformedTokenError extends SessionTokenError {
  constructor(message = 'Malformed token') {
    super('MALFORMED', message);
    this.name = 'MalformedTokenError';
  }
}

const SessionClaimsSchema = z.object({
  sub: z
    .string()
    .regex(/^[1-9]\d{0,15}$/)
    .refine((sub) => Number.isSafeInteger(Number(sub))),
  email: z.string().optional(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type IssuedSessionToken = {
  token: string;
  /** Seconds until expiry, as returned to clients. */
  expiresIn: number;
  issuedAt: Date;
  expiresAt: Date;
};

export type ValidatedSession = {
  userId: number;
  email: string | null;
  issuedAt: Date;
  expiresAt: Date;
};

export type SessionTokenIssuerOptions = {
  secret: string;
  algorithm: JwtAlgorithm;
  ttlSeconds: number;
  now?: () => Date;
};

const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

export class SessionTokenIssuer {
  private readonly now: () => Date;

  constructor(private readonly opts: SessionTokenIssuerOptions) {
    if (opts.ttlSeconds <= 0) {
      throw new Error(`SessionTokenIssuer: ttlSeconds must be positive. Got ${opts.ttlSeconds}.`);
    }
    this.now = opts.now ?? (() => new Date());
  }

  get ttlSeconds(): number {
    return this.opts.ttlSeconds;
  }

  issue(user: { id: number; email: string }): IssuedSessionToken {
    const iat = Math.floor(this.now().getTime() / 1000);
    const exp = iat + this.opts.ttlSeconds;

    const token = jwt.sign({ sub: String(user.id), email: user.email, iat, exp }, this.opts.secret, {
      algorithm: this.opts.algorithm,
    });

    return {
      token,
      expiresIn: this.opts.ttlSeconds,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  validate(token: string): ValidatedSession {
    if (!token) throw new MalformedTokenError('Token is empty');

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.opts.secret, {
        algorithms: [this.opts.algorithm],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch (err) {
      throw toSessionTokenError(err);
    }

    if (typeof decoded === 'string') {
      throw new MalformedTokenError('Token payload is not a JSON object');
    }

    const claims = SessionClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new MalformedTokenError('Token claims are invalid');
    }

    return {
      userId: Number(claims.data.sub),
      email: claims.data.email ?? null,
      issuedAt: new Date(claims.data.iat * 1000),
      expiresAt: new Date(claims.data.exp * 1000),
    };
  }
}

function toSessionTokenError(err: unknown): SessionTokenError {
  // TokenExpiredError extends JsonWebTokenError: check it first.
  if (err instanceof jwt.TokenExpiredError) {
    return new ExpiredTokenError(err.expiredAt);
  }

  if (err instanceof jwt.JsonWebTokenError) {
    if (SIGNATURE_FAILURES.has(err.message)) return new InvalidTokenError();
    return new MalformedTokenError();
  }

  return new MalformedTokenError();
}
