import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { AuthResponseSchema, ErrorResponseSchema, emailLogin } from '../helpers/api';

const GOOGLE_ACCOUNT = {
  email: 'ada@example.com',
  name: 'Ada Lovelace',
  picture: 'https://img.example/ada.png',
  subjectId: 'google-sub-1',
};

describe('POST /api/v1/auth/google', () => {
  it('creates a user from verified Google claims', async () => {
    const { app, google, queue, close } = await buildTestApp();
    google.accept('test-google-token', GOOGLE_ACCOUNT);

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/auth/google',
        payload: { access_token: 'test-google-token', id_token: 'test-id-token' },
      });

      expect(res.statusCode).toBe(200);
      const body = AuthResponseSchema.parse(res.json());
      expect(body.is_new_user).toBe(true);
      expect(body.user).toMatchObject({
        id: 1,
        email: 'ada@example.com',
        name: 'Ada Lovelace',
        picture: 'https://img.example/ada.png',
        google_id: 'google-sub-1',
        wallet_address: null,
      });
      expect(google.calls).toEqual([{ accessToken: 'test-google-token', idToken: 'test-id-token' }]);
      expect(queue.drain()).toHaveLength(1);
    } finally {
      await close();
    }
  });

  it('links Google to an existing email-only user', async () => {
    const { app, google, queue, close } = await buildTestApp();
    google.accept('test-google-token', GOOGLE_ACCOUNT);

    try {
      const viaEmail = await emailLogin(app, { email: 'ada@example.com', name: 'Ada' });
      queue.drain();

      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/auth/google',
        payload: { access_token: 'test-google-token' },
      });

      const body = AuthResponseSchema.parse(res.json());
      expect(body.is_new_user).toBe(false);
      expect(body.user.id).toBe(viaEmail.user.id);
      expect(body.user.google_id).toBe('google-sub-1');
      expect(queue.drain()).toEqual([]);
    } finally {
      await close();
    }
  });

  it('answers 401 AUTHENTICATION_FAILED when Google rejects the token', async () => {
    const { app, store, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/auth/google',
        payload: { access_token: 'unknown-token' },
      });

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(ErrorResponseSchema.parse(res.json()).error).toEqual({
        code: 401,
        message: 'Could not verify Google credentials.',
        type: 'AUTHENTICATION_FAILED',
        details: [],
      });
      expect(store.count()).toBe(0);
    } finally {
      await close();
    }
  });

  it('answers 422 when access_token is missing', async () => {
    const { app, google, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'POST', url: '/api/v1/auth/google', payload: {} });

      expect(res.statusCode).toBe(422);
      const body = ErrorResponseSchema.parse(res.json());
      expect(body.error.details[0]?.field).toBe('access_token');
      expect(google.calls).toEqual([]);
    } finally {
      await close();
    }
  });

  it('answers 409 when the email belongs to another Google account', async () => {
    const { app, google, close } = await buildTestApp();
    google.accept('token-a', GOOGLE_ACCOUNT);
    google.accept('token-b', { ...GOOGLE_ACCOUNT, subjectId: 'google-sub-2' });

    try {
      await app.inject({ method: 'POST', url: '/api/v1/auth/google', payload: { access_token: 'token-a' } });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/auth/google',
        payload: { access_token: 'token-b' },
      });

      expect(res.statusCode).toBe(409);
      expect(ErrorResponseSchema.parse(res.json()).error.type).toBe('CONFLICT');
    } finally {
      await close();
    }
  });
});
