import assert from 'node:assert/strict';
import test from 'node:test';

import { CredentialManager } from '../src/services/credentialManager.service';
import { AuthError, TransientAuthError } from '../src/utils/errors';
import { deferred, FakeVehicleApi, ManualClock } from './helpers/fakes';

test('concurrent callers with an expired token share exactly one refresh', async () => {
  const clock = new ManualClock();
  const api = new FakeVehicleApi();
  const pending = deferred<{ accessToken: string; refreshToken: string | null; expiresInSeconds: number }>();
  api.onRefreshToken = () => pending.promise;

  const credentials = new CredentialManager({
    api,
    refreshToken: 'test-refresh-token',
    accessToken: 'expired-token',
    expiresAt: clock.now() - 1,
    now: clock.now,
  });

  const callers = Array.from({ length: 8 }, () => credentials.getValidToken());
  pending.resolve({ accessToken: 'fresh-token', refreshToken: null, expiresInSeconds: 3600 });
  const tokens = await Promise.all(callers);

  assert.deepEqual(new Set(tokens), new Set(['fresh-token']));
  assert.equal(api.count('refreshToken'), 1);
  assert.equal(credentials.status().refreshCount, 1);
});

test('a token expiring within the safety margin is refreshed exactly once', async () => {
  const clock = new ManualClock();
  const api = new FakeVehicleApi();
  const credentials = new CredentialManager({
    api,
    refreshToken: 'test-refresh-token',
    accessToken: 'almost-expired',
    expiresAt: clock.now() + 10_000,
    safetyMarginMs: 30_000,
    now: clock.now,
  });

  assert.equal(await credentials.getValidToken(), 'test-access-token');
  assert.equal(await credentials.getValidToken(), 'test-access-token');
  assert.equal(api.count('refreshToken'), 1);
  assert.equal(credentials.status().expiresAt, clock.now() + 3600 * 1000);
});

test('a token valid beyond the margin is returned without calling upstream', async () => {
  const clock = new ManualClock();
  const api = new FakeVehicleApi();
  const credentials = new CredentialManager({
    api,
    refreshToken: 'test-refresh-token',
    accessToken: 'cached-token',
    expiresAt: clock.now() + 120_000,
    now: clock.now,
  });

  assert.equal(await credentials.getValidToken(), 'cached-token');
  assert.equal(api.count('refreshToken'), 0);
});

test('a rejected refresh token is terminal', async () => {
  const api = new FakeVehicleApi();
  const rejection = new AuthError('Refresh token rejected by the token endpoint.', 401);
  api.onRefreshToken = async () => {
    throw rejection;
  };
  const credentials = new CredentialManager({ api, refreshToken: 'test-refresh-token' });

  await assert.rejects(credentials.getValidToken(), (error) => error === rejection);
  await assert.rejects(credentials.getValidToken(), (error) => error === rejection);

  assert.equal(api.count('refreshToken'), 1);
  assert.equal(credentials.status().terminal, true);
  assert.equal(credentials.status().lastError, rejection.message);
});

test('transient refresh failures are wrapped and retried on the next call', async () => {
  const api = new FakeVehicleApi();
  let attempts = 0;
  api.onRefreshToken = async () => {
    attempts += 1;
    if (attempts === 1) {
      throw new Error('socket hang up');
    }
    return { accessToken: 'second-try', refreshToken: null, expiresInSeconds: 3600 };
  };
  const credentials = new CredentialManager({ api, refreshToken: 'test-refresh-token' });

  await assert.rejects(credentials.getValidToken(), TransientAuthError);
  assert.equal(credentials.status().terminal, false);
  assert.equal(await credentials.getValidToken(), 'second-try');
  assert.equal(api.count('refreshToken'), 2);
});

test('invalidate forces a refresh and rotated refresh tokens are kept', async () => {
  const api = new FakeVehicleApi();
  const usedRefreshTokens: string[] = [];
  api.onRefreshToken = async (refreshToken) => {
    usedRefreshTokens.push(refreshToken);
    return usedRefreshTokens.length === 1
      ? { accessToken: 'access-1', refreshToken: 'rotated-refresh-token', expiresInSeconds: 3600 }
      : { accessToken: 'access-2', refreshToken: null, expiresInSeconds: 3600 };
  };
  const credentials = new CredentialManager({ api, refreshToken: 'test-refresh-token' });

  assert.equal(await credentials.getValidToken(), 'access-1');
  credentials.invalidate();
  assert.equal(credentials.status().expiresAt, null);
  assert.equal(await credentials.getValidToken(), 'access-2');
  credentials.invalidate();
  await credentials.getValidToken();

  assert.deepEqual(usedRefreshTokens, [
    'test-refresh-token',
    'rotated-refresh-token',
    'rotated-refresh-token',
  ]);
});
