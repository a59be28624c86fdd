import { describe, it, expect, vi } from 'vitest';
import { UserDirectory } from '../../../src/modules/users/user.directory';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';
import {
  WalletProvisioner,
  createWalletProvisionHandler,
} from '../../../src/modules/wallets/wallet.provisioner';
import {
  WalletProviderError,
  type WalletProvider,
} from '../../../src/modules/wallets/providers/wallet-provider';
import { FakeWalletProvider, fakeWalletAddress } from '../../helpers/fakes';
import { silentLogger } from '../../helpers/silent-logger';

async function setup(provider: WalletProvider = new FakeWalletProvider()) {
  const store = new InMemUserStore();
  const logger = silentLogger();
  const directory = new UserDirectory({ store, logger });
  const provisioner = new WalletProvisioner({ directory, provider, logger });

  const { user } = await directory.findOrCreate({
    email: 'ada@example.com',
    name: 'Ada',
    picture: null,
    subjectId: null,
  });

  return { store, directory, provisioner, logger, user };
}

describe('WalletProvisioner.provision', () => {
  it('creates a wallet and stores its address', async () => {
    const provider = new FakeWalletProvider();
    const { provisioner, directory, user } = await setup(provider);

    const outcome = await provisioner.provision(user.id);

    expect(outcome).toEqual({
      status: 'assigned',
      userId: user.id,
      walletAddress: fakeWalletAddress(user.id),
    });
    expect((await directory.getById(user.id)).walletAddress).toBe(fakeWalletAddress(user.id));
    expect(provider.calls).toEqual([user.id]);
  });

  it('does not call the vendor again once a wallet is assigned', async () => {
    const provider = new FakeWalletProvider();
    const { provisioner, user } = await setup(provider);
    await provisioner.provision(user.id);

    const outcome = await provisioner.provision(user.id);

    expect(outcome).toEqual({
      status: 'already_assigned',
      userId: user.id,
      walletAddress: fakeWalletAddress(user.id),
    });
    expect(provider.calls).toHaveLength(1);
  });

  it('reports an unknown user without calling the vendor', async () => {
    const provider = new FakeWalletProvider();
    const { provisioner } = await setup(provider);

    expect(await provisioner.provision(404)).toEqual({ status: 'user_not_found', userId: 404 });
    expect(provider.calls).toEqual([]);
  });

  it('reports vendor failures and leaves the wallet empty', async () => {
    const provider = new FakeWalletProvider();
    provider.failNext(1);
    const { provisioner, directory, logger, user } = await setup(provider);
    const error = vi.spyOn(logger, 'error');

    const outcome = await provisioner.provision(user.id);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(WalletProviderError);
    expect((await directory.getById(user.id)).walletAddress).toBeNull();
    expect(error).toHaveBeenCalledWith(
      'wallet.provision.failed',
      expect.objectContaining({ userId: user.id, message: 'connect ECONNREFUSED' }),
    );
  });

  it('keeps the first address when another assignment wins the race', async () => {
    const first = `0x${'1'.repeat(40)}`;
    const late = `0x${'2'.repeat(40)}`;

    let directoryRef: UserDirectory | null = null;
    const racingProvider: WalletProvider = {
      name: 'racing',
      async createWallet(userId) {
        // A concurrent job assigns a wallet while our vendor call is in flight.
        if (directoryRef) await directoryRef.updateWalletAddress(userId, first);
        return late;
      },
    };
    const { provisioner, directory, user } = await setup(racingProvider);
    directoryRef = directory;

    const outcome = await provisioner.provision(user.id);

    expect(outcome).toEqual({ status: 'already_assigned', userId: user.id, walletAddress: first });
    expect((await directory.getById(user.id)).walletAddress).toBe(first);
  });
});

describe('createWalletProvisionHandler', () => {
  it('rethrows failures so the queue can retry', async () => {
    const provider = new FakeWalletProvider();
    provider.failNext(1);
    const { provisioner, user } = await setup(provider);
    const handle = createWalletProvisionHandler(provisioner);

    await expect(handle({ userId: user.id, requestId: null })).rejects.toThrowError(
      'connect ECONNREFUSED',
    );
    await expect(handle({ userId: user.id, requestId: null })).resolves.toBeUndefined();
  });

  it('treats a missing user as done', async () => {
    const { provisioner } = await setup();
    const handle = createWalletProvisionHandler(provisioner);

    await expect(handle({ userId: 999, requestId: 'req-12345678' })).resolves.toBeUndefined();
  });
});
