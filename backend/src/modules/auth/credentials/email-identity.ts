/**
 * src/modules/auth/credentials/email-identity.ts
 *
 * WHY:
 * - The email path asserts an identity without any external proof. It is a
 *   lower-trust login kept for clients without Google; it can be switched off
 *   with EMAIL_LOGIN_ENABLED and is rate limited per IP and per email.
 *
 * RULES:
 * - No I/O. Input is already validated by the Zod body schema.
 */

import { USER_FIELD_LIMITS, type IdentityClaims } from '../../users/user.types';

export function nameFromEmail(email: string): string {
  const at = email.indexOf('@');
  const local = at > 0 ? email.slice(0, at) : email;
  return local.slice(0, USER_FIELD_LIMITS.name);
}

export function acceptEmail(input: {
  email: string;
  name: string;
  picture?: string | null;
}): IdentityClaims {
  return {
    email: input.email.trim().toLowerCase(),
    name: input.name.trim(),
    picture: input.picture ?? null,
    subjectId: null,
  };
}
