/**
 * src/modules/auth/credentials/google-identity.verifier.ts
 *
 * WHY:
 * - The client finishes the OAuth dance and hands us a Google access token.
 *   We trust nothing it says about the user: the identity comes from Google's
 *   userinfo endpoint, called with that token.
 * - An optional ID token is cross-checked against tokeninfo (same subject,
 *   and our client id as audience when one is configured).
 *
 * RULES:
 * - Every failure (network, non-2xx, unexpected payload, mismatch) is a 401
 *   AUTHENTICATION_FAILED. The reason goes to meta (logged), not to the client.
 * - Never log the tokens.
 * - Profile fields that do not fit their column are dropped, never cut:
 *   a cut URL is a broken link. A missing name falls back to the email local part.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { USER_FIELD_LIMITS, type IdentityClaims } from '../../users/user.types';
import { AuthErrors } from '../auth.errors';
import { nameFromEmail } from './email-identity';

export const GOOGLE_USERINFO_URL = 'https://www.googleapis.com/oauth2/v3/userinfo';
export const GOOGLE_TOKENINFO_URL = 'https://oauth2.googleapis.com/tokeninfo';

const UserInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().max(USER_FIELD_LIMITS.email),
  name: z.string().optional(),
  picture: z.string().optional(),
});

const TokenInfoSchema = z.object({
  sub: z.string().min(1),
  aud: z.string().optional(),
});

export interface GoogleIdentityVerifier {
  verify(input: { accessToken: string; idToken?: string }): Promise<IdentityClaims>;
}

export class HttpGoogleIdentityVerifier implements GoogleIdentityVerifier {
  constructor(
    private readonly http: AxiosInstance,
    private readonly clientId: string | null,
  ) {}

  static create(opts: { clientId: string | null; timeoutMs: number }): HttpGoogleIdentityVerifier {
    return new HttpGoogleIdentityVerifier(axios.create({ timeout: opts.timeoutMs }), opts.clientId);
  }

  async verify(input: { accessToken: string; idToken?: string }): Promise<IdentityClaims> {
    const info = UserInfoSchema.safeParse(
      await this.fetchJson(GOOGLE_USERINFO_URL, {
        headers: { Authorization: `Bearer ${input.accessToken}` },
      }),
    );
    if (!info.success) {
      throw AuthErrors.authenticationFailed({ reason: 'userinfo_payload' });
    }

    if (input.idToken) {
      const tokenInfo = TokenInfoSchema.safeParse(
        await this.fetchJson(GOOGLE_TOKENINFO_URL, { params: { id_token: input.idToken } }),
      );
      if (!tokenInfo.success) {
        throw AuthErrors.authenticationFailed({ reason: 'tokeninfo_payload' });
      }
      if (tokenInfo.data.sub !== info.data.sub) {
        throw AuthErrors.authenticationFailed({ reason: 'id_token_subject_mismatch' });
      }
      if (this.clientId && tokenInfo.data.aud !== this.clientId) {
        throw AuthErrors.authenticationFailed({ reason: 'id_token_audience_mismatch' });
      }
    }

    const email = info.data.email.toLowerCase();
    const name = fitting(info.data.name?.trim(), USER_FIELD_LIMITS.name);

    return {
      email,
      name: name ?? nameFromEmail(email),
      picture: fitting(info.data.picture, USER_FIELD_LIMITS.picture),
      subjectId: info.data.sub,
    };
  }

  private async fetchJson(
    url: string,
    opts: { headers?: Record<string, string>; params?: Record<string, string> },
  ): Promise<unknown> {
    try {
      const res = await this.http.get<unknown>(url, opts);
      return res.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw AuthErrors.authenticationFailed({
          reason: 'google_request_failed',
          status: err.response?.status ?? null,
        });
      }
      throw err;
    }
  }
}

function fitting(value: string | undefined, maxLength: number): string | null {
  if (!value || value.length > maxLength) return null;
  return value;
}
