import assert from 'node:assert/strict';
import { once } from 'node:events';
import type { AddressInfo } from 'node:net';
import test from 'node:test';
import { z } from 'zod';

import { createApp } from '../src/app';
import { getAppConfig } from '../src/config/appConfig';
import { createRuntime } from '../src/runtime';
import { AuthError } from '../src/utils/errors';
import { buildConfig, FakeVehicleApi, ManualClock, telemetry } from './helpers/fakes';

const API_KEY = 'test-secret';

const errorBody = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.object({ reason: z.string().nullable() }).partial().optional(),
    requestId: z.string().optional(),
  }),
});

const readyBody = z.object({
  status: z.literal('ready'),
  details: z.object({ running: z.boolean(), devices: z.number() }),
});

const vehicleResource = z.object({
  id: z.string(),
  vin: z.string().nullable(),
  displayName: z.string(),
  state: z.string(),
  availability: z.number(),
  snapshot: z.object({ stale: z.boolean(), ageSeconds: z.number().nullable() }).nullable(),
});

const setup = () => {
  const clock = new ManualClock();
  const api = new FakeVehicleApi();
  api.onGetVehicleData = async () => telemetry(clock.now());
  const runtime = createRuntime(buildConfig(), { api, now: clock.now });
  runtime.registry.register({ id: '1001' });
  runtime.cache.register('1001');
  const app = createApp(runtime, getAppConfig({ API_KEY }));
  return { api, runtime, app };
};

const withServer = async (
  app: ReturnType<typeof createApp>,
  run: (baseUrl: string) => Promise<void>,
): Promise<void> => {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');
  const { port }: AddressInfo = address;

  try {
    await run(`http://127.0.0.1:${port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
};

test('serves the exposition on the metrics path', async () => {
  const { app } = setup();

  await withServer(app, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/metrics`);
    const body = await response.text();

    assert.equal(response.status, 200);
    assert.match(response.headers.get('content-type') ?? '', /^text\/plain;.*version=0\.0\.4/);
    assert.ok(body.split('\n').includes('tesla_exporter_auth_ok 1'));
    assert.ok(body.endsWith('\n'));
  });
});

test('health is always ok and readiness follows the credential state', async () => {
  const { api, runtime, app } = setup();

  await withServer(app, async (baseUrl) => {
    const health = await fetch(`${baseUrl}/health`);
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { status: 'ok' });

    const ready = await fetch(`${baseUrl}/ready`);
    const { details } = readyBody.parse(await ready.json());
    assert.equal(ready.status, 200);
    assert.equal(details.devices, 1);
    assert.equal(details.running, false);

    api.onRefreshToken = async () => {
      throw new AuthError('Refresh token rejected by the token endpoint.', 401);
    };
    await assert.rejects(runtime.credentials.getValidToken(), AuthError);

    const halted = await fetch(`${baseUrl}/ready`);
    const { error } = errorBody.parse(await halted.json());
    assert.equal(halted.status, 503);
    assert.equal(error.code, 'SERVICE_UNAVAILABLE');
    assert.equal(error.details?.reason, 'Refresh token rejected by the token endpoint.');
  });
});

test('the vehicles api requires the api key', async () => {
  const { app } = setup();

  await withServer(app, async (baseUrl) => {
    const missing = await fetch(`${baseUrl}/api/v1/vehicles`);
    const { error } = errorBody.parse(await missing.json());
    assert.equal(missing.status, 401);
    assert.equal(error.code, 'UNAUTHORIZED');
    assert.equal(error.message, 'Invalid API key');
    assert.equal(typeof error.requestId, 'string');

    const wrong = await fetch(`${baseUrl}/api/v1/vehicles`, { headers: { 'x-api-key': 'nope' } });
    assert.equal(wrong.status, 401);
  });
});

test('the vehicles api lists tracked vehicles with their cache state', async () => {
  const { runtime, app } = setup();
  await runtime.poller.poll('1001');
  const headers = { 'x-api-key': API_KEY };

  await withServer(app, async (baseUrl) => {
    const list = await fetch(`${baseUrl}/api/v1/vehicles`, { headers });
    const { data } = z.object({ data: z.array(vehicleResource) }).parse(await list.json());
    assert.equal(list.status, 200);
    assert.equal(data.length, 1);
    assert.equal(data[0].id, '1001');
    assert.equal(data[0].displayName, 'Test Car');
    assert.equal(data[0].state, 'online');
    assert.equal(data[0].availability, 1);
    assert.deepEqual(data[0].snapshot, { stale: false, ageSeconds: 0 });

    const asleep = await fetch(`${baseUrl}/api/v1/vehicles?state=asleep`, { headers });
    assert.deepEqual(await asleep.json(), { data: [] });

    const invalid = await fetch(`${baseUrl}/api/v1/vehicles?state=dozing`, { headers });
    assert.equal(invalid.status, 400);
    assert.equal(errorBody.parse(await invalid.json()).error.code, 'BAD_REQUEST');

    const single = await fetch(`${baseUrl}/api/v1/vehicles/1001`, { headers });
    const { data: vehicle } = z.object({ data: vehicleResource }).parse(await single.json());
    assert.equal(vehicle.vin, 'VINTEST0000000001');

    const unknown = await fetch(`${baseUrl}/api/v1/vehicles/9999`, { headers });
    const { error } = errorBody.parse(await unknown.json());
    assert.equal(unknown.status, 404);
    assert.equal(error.code, 'NOT_FOUND');
    assert.equal(error.message, 'Vehicle 9999 is not tracked');
  });
});

test('unknown routes answer with a json 404', async () => {
  const { app } = setup();

  await withServer(app, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/nothing-here`);
    const { error } = errorBody.parse(await response.json());

    assert.equal(response.status, 404);
    assert.equal(error.code, 'NOT_FOUND');
    assert.equal(error.message, 'Resource not found');
    assert.equal(typeof error.requestId, 'string');
  });
});
