/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates the two login paths (Google, email) and the "who am I" lookup.
 * - Both paths end the same way: find-or-create the user, mint a session
 *   token, and for first-time users hand wallet provisioning to the queue.
 *
 * RULES:
 * - Rate limit at the start of each flow (before any external call or DB work).
 * - Wallet provisioning never blocks or fails a login: the job is enqueued
 *   after the response is built, and an enqueue failure is only logged.
 * - Never log raw tokens or full emails.
 */

import type { Logger } from '../../shared/logger/logger';
import { emailDomain } from '../../shared/logger/with-context';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { SessionTokenIssuer } from '../../shared/security/session-token';
import type { Queue } from '../../shared/messaging/queue';
import type { UserDirectory } from '../users/user.directory';
import type { IdentityClaims, User } from '../users/user.types';

import { AUTH_RATE_LIMITS } from './auth.constants';
import { AuthErrors } from './auth.errors';
import { toUserResponse, type AuthResponse, type LoginContext, type UserResponse } from './auth.types';
import type { GoogleIdentityVerifier } from './credentials/google-identity.verifier';
import { acceptEmail } from './credentials/email-identity';

export type GoogleLoginParams = LoginContext & {
  accessToken: string;
  idToken?: string;
};

export type EmailLoginParams = LoginContext & {
  email: string;
  name: string;
  picture?: string;
};

export class AuthService {
  constructor(
    private readonly deps: {
      directory: UserDirectory;
      googleVerifier: GoogleIdentityVerifier;
      sessionTokens: SessionTokenIssuer;
      queue: Queue;
      rateLimiter: RateLimiter;
      emailKeyHasher: KeyedHasher;
      logger: Logger;
      emailLoginEnabled: boolean;
    },
  ) {}

  async loginWithGoogle(params: GoogleLoginParams): Promise<AuthResponse> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.login.perIp,
    });

    const claims = await this.deps.googleVerifier.verify({
      accessToken: params.accessToken,
      idToken: params.idToken,
    });

    await this.hitEmailLimit(claims.email);

    return this.completeLogin(claims, params, 'google');
  }

  async loginWithEmail(params: EmailLoginParams): Promise<AuthResponse> {
    if (!this.deps.emailLoginEnabled) {
      throw AuthErrors.emailLoginDisabled();
    }

    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.login.perIp,
    });

    const claims = acceptEmail(params);
    await this.hitEmailLimit(claims.email);

    return this.completeLogin(claims, params, 'email');
  }

  async me(userId: number): Promise<UserResponse> {
    const user = await this.deps.directory.findById(userId);
    if (!user) throw AuthErrors.unknownSubject({ userId });
    return toUserResponse(user);
  }

  private async hitEmailLimit(email: string): Promise<void> {
    const emailKey = this.deps.emailKeyHasher.hash(email);
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:email:${emailKey}`,
      ...AUTH_RATE_LIMITS.login.perEmail,
    });
  }

  private async completeLogin(
    claims: IdentityClaims,
    ctx: LoginContext,
    provider: 'google' | 'email',
  ): Promise<AuthResponse> {
    const { user, isNew } = await this.deps.directory.findOrCreate(claims);
    const issued = this.deps.sessionTokens.issue({ id: user.id, email: user.email });

    const response: AuthResponse = {
      access_token: issued.token,
      token_type: 'bearer',
      expires_in: issued.expiresIn,
      is_new_user: isNew,
      user: toUserResponse(user),
    };

    this.deps.logger.info('auth.login.success', {
      flow: `auth.login.${provider}`,
      requestId: ctx.requestId,
      userId: user.id,
      emailDomain: emailDomain(user.email),
      isNewUser: isNew,
    });

    if (isNew) await this.enqueueWalletProvision(user, ctx.requestId);

    return response;
  }

  private async enqueueWalletProvision(user: User, requestId: string): Promise<void> {
    try {
      await this.deps.queue.enqueue({ type: 'wallet.provision', userId: user.id, requestId });
    } catch (err) {
      this.deps.logger.error('wallet.provision.enqueue_failed', {
        flow: 'auth.login',
        requestId,
        userId: user.id,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
