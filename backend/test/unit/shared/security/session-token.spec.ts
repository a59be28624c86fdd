import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import {
  ExpiredTokenError,
  InvalidTokenError,
  MalformedTokenError,
  SessionTokenIssuer,
} from '../../../../src/shared/security/session-token';

const SECRET = 'test-secret-jwt-key-0123456789abcdef';
const START = new Date('2026-01-01T00:00:00.000Z');

function issuerAt(clock: { now: Date }, overrides: Partial<{ secret: string; ttlSeconds: number }> = {}) {
  return new SessionTokenIssuer({
    secret: overrides.secret ?? SECRET,
    algorithm: 'HS256',
    ttlSeconds: overrides.ttlSeconds ?? 3600,
    now: () => clock.now,
  });
}

describe('SessionTokenIssuer', () => {
  it('issues a token that validates back to the same user', () => {
    const clock = { now: START };
    const issuer = issuerAt(clock);

    const issued = issuer.issue({ id: 42, email: 'ada@example.com' });

    expect(issued.expiresIn).toBe(3600);
    expect(issued.issuedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(issued.expiresAt.toISOString()).toBe('2026-01-01T01:00:00.000Z');

    const session = issuer.validate(issued.token);
    expect(session).toEqual({
      userId: 42,
      email: 'ada@example.com',
      issuedAt: issued.issuedAt,
      expiresAt: issued.expiresAt,
    });
  });

  it('puts the user id in sub as a decimal string', () => {
    const issuer = issuerAt({ now: START });
    const { token } = issuer.issue({ id: 7, email: 'a@b.com' });

    const decoded = jwt.decode(token);
    expect(decoded).toMatchObject({ sub: '7', email: 'a@b.com' });
  });

  it('accepts a token one second before expiry', () => {
    const clock = { now: START };
    const issuer = issuerAt(clock);
    const { token } = issuer.issue({ id: 1, email: 'a@b.com' });

    clock.now = new Date(START.getTime() + 3599 * 1000);
    expect(issuer.validate(token).userId).toBe(1);
  });

  it('rejects a token at its expiry instant', () => {
    const clock = { now: START };
    const issuer = issuerAt(clock);
    const { token } = issuer.issue({ id: 1, email: 'a@b.com' });

    clock.now = new Date(START.getTime() + 3600 * 1000);
    expect(() => issuer.validate(token)).toThrowError(ExpiredTokenError);
  });

  it('rejects a token signed with another secret', () => {
    const clock = { now: START };
    const other = issuerAt(clock, { secret: 'test-secret-other-key-0123456789abcd' });
    const { token } = other.issue({ id: 1, email: 'a@b.com' });

    expect(() => issuerAt(clock).validate(token)).toThrowError(InvalidTokenError);
  });

  it('rejects a token signed with another algorithm', () => {
    const iat = Math.floor(START.getTime() / 1000);
    const token = jwt.sign({ sub: '1', iat, exp: iat + 60 }, SECRET, { algorithm: 'HS512' });

    expect(() => issuerAt({ now: START }).validate(token)).toThrowError(InvalidTokenError);
  });

  it('rejects a tampered payload', () => {
    const issuer = issuerAt({ now: START });
    const { token } = issuer.issue({ id: 1, email: 'a@b.com' });
    const [header, , signature] = token.split('.');

    const forgedPayload = Buffer.from(
      JSON.stringify({ sub: '2', email: 'a@b.com', iat: 1, exp: 9_999_999_999 }),
    ).toString('base64url');

    expect(() => issuer.validate(`${header}.${forgedPayload}.${signature}`)).toThrowError(
      InvalidTokenError,
    );
  });

  it('rejects garbage as malformed', () => {
    const issuer = issuerAt({ now: START });

    expect(() => issuer.validate('not-a-jwt')).toThrowError(MalformedTokenError);
    expect(() => issuer.validate('')).toThrowError('Token is empty');
  });

  it('rejects a non-numeric subject as malformed', () => {
    const iat = Math.floor(START.getTime() / 1000);
    const token = jwt.sign({ sub: 'abc', iat, exp: iat + 60 }, SECRET, { algorithm: 'HS256' });

    expect(() => issuerAt({ now: START }).validate(token)).toThrowError(MalformedTokenError);
  });

  it('rejects a subject above the largest safe integer as malformed', () => {
    const iat = Math.floor(START.getTime() / 1000);
    const token = jwt.sign({ sub: '9007199254740993', iat, exp: iat + 60 }, SECRET, {
      algorithm: 'HS256',
    });

    expect(() => issuerAt({ now: START }).validate(token)).toThrowError(MalformedTokenError);
  });

  it('accepts the largest safe integer as a subject', () => {
    const iat = Math.floor(START.getTime() / 1000);
    const token = jwt.sign({ sub: '9007199254740991', iat, exp: iat + 60 }, SECRET, {
      algorithm: 'HS256',
    });

    expect(issuerAt({ now: START }).validate(token).userId).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('refuses a non-positive ttl', () => {
    expect(() => issuerAt({ now: START }, { ttlSeconds: 0 })).toThrowError(/ttlSeconds/);
  });
});
