/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Wire shapes returned by the auth endpoints (snake_case, as clients expect).
 * - Keeps the controller free of mapping code.
 */

import type { User } from '../users/user.types';

export type UserResponse = {
  id: number;
  email: string;
  name: string;
  picture: string | null;
  google_id: string | null;
  wallet_address: string | null;
  created_at: string;
};

export type AuthResponse = {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
  is_new_user: boolean;
  user: UserResponse;
};

export type LoginContext = {
  ip: string;
  requestId: string;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    picture: user.picture,
    google_id: user.googleId,
    wallet_address: user.walletAddress,
    created_at: user.createdAt.toISOString(),
  };
}
