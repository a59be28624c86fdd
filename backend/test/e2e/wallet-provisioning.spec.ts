import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { UserResponseSchema, bearer, emailLogin } from '../helpers/api';
import { fakeWalletAddress } from '../helpers/fakes';
import { WorkQueue } from '../../src/shared/messaging/work-queue';

/**
 * End to end through the real WorkQueue: login enqueues, the worker calls the
 * (fake) wallet vendor, the directory stores the address.
 */

async function settle(queue: unknown): Promise<WorkQueue> {
  if (!(queue instanceof WorkQueue)) throw new Error('expected the app to run a WorkQueue');
  await queue.onIdle();
  return queue;
}

describe('wallet provisioning after first login', () => {
  it('assigns a wallet in the background', async () => {
    const { app, deps, wallet, close } = await buildTestApp({ workQueue: true });

    try {
      const login = await emailLogin(app);
      expect(login.user.wallet_address).toBeNull();

      const queue = await settle(deps.queue);

      const me = await app.inject({
        method: 'GET',
        url: '/api/v1/auth/me',
        headers: bearer(login.access_token),
      });
      expect(UserResponseSchema.parse(me.json()).wallet_address).toBe(fakeWalletAddress(1));
      expect(wallet.calls).toEqual([1]);
      expect(queue.stats()).toMatchObject({ processed: 1, dropped: 0 });
    } finally {
      await close();
    }
  });

  it('does not provision again on later logins', async () => {
    const { app, deps, wallet, close } = await buildTestApp({ workQueue: true });

    try {
      await emailLogin(app);
      await settle(deps.queue);
      await emailLogin(app);
      await settle(deps.queue);

      expect(wallet.calls).toEqual([1]);
    } finally {
      await close();
    }
  });

  it('recovers from a transient vendor failure through retries', async () => {
    const { app, deps, wallet, close } = await buildTestApp({ workQueue: true });
    wallet.failNext(1);

    try {
      const login = await emailLogin(app);
      const queue = await settle(deps.queue);

      const me = await app.inject({
        method: 'GET',
        url: '/api/v1/auth/me',
        headers: bearer(login.access_token),
      });
      expect(UserResponseSchema.parse(me.json()).wallet_address).toBe(fakeWalletAddress(1));
      expect(queue.stats()).toMatchObject({ processed: 1, retried: 1, dropped: 0 });
    } finally {
      await close();
    }
  });

  it('keeps login working while the vendor is unreachable', async () => {
    const { app, deps, wallet, close } = await buildTestApp({ workQueue: true });
    wallet.failNext(Number.POSITIVE_INFINITY);

    try {
      const login = await emailLogin(app);
      expect(login.is_new_user).toBe(true);

      const queue = await settle(deps.queue);

      const me = await app.inject({
        method: 'GET',
        url: '/api/v1/auth/me',
        headers: bearer(login.access_token),
      });
      expect(me.statusCode).toBe(200);
      expect(UserResponseSchema.parse(me.json()).wallet_address).toBeNull();
      expect(wallet.calls).toEqual([1, 1, 1]);
      expect(queue.stats()).toMatchObject({ processed: 0, failed: 3, retried: 2, dropped: 1 });
    } finally {
      await close();
    }
  });
});
