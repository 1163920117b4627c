import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { ZodError } from 'zod';

import { getAppConfig } from '../src/config/appConfig';
import { getExporterConfig } from '../src/config/exporterConfig';

test('simulated mode needs no credentials and takes the defaults', () => {
  const config = getExporterConfig({ TESLA_MODE: 'simulated' });

  assert.equal(config.mode, 'simulated');
  assert.equal(config.refreshToken, null);
  assert.deepEqual(config.vehicleIds, []);
  assert.equal(config.poll.onlineIntervalMs, 60_000);
  assert.equal(config.poll.presenceCheckEveryCycles, 15);
  assert.equal(config.wake.policy, 'never-wake');
  assert.equal(config.cache.staleMode, 'flag');
  assert.deepEqual(config.rateLimits.telemetry, { capacity: 30, refillPerMinute: 6, minIntervalMs: 0 });
  assert.deepEqual(config.rateLimits.wake, { capacity: 2, refillPerMinute: 0.2, minIntervalMs: 60_000 });
});

test('live mode requires a refresh token', () => {
  assert.throws(() => getExporterConfig({}), /TESLA_REFRESH_TOKEN is required when TESLA_MODE is live/);
});

test('environment values are coerced and lists are split', () => {
  const config = getExporterConfig({
    TESLA_MODE: 'LIVE',
    TESLA_REFRESH_TOKEN: 'test-secret',
    TESLA_VEHICLE_IDS: ' 1001, ,1002 ',
    POLL_ONLINE_INTERVAL_MS: '30000',
    WAKE_POLICY: 'wake-on-schedule',
    STALE_MODE: 'omit',
    RATE_WAKE_CAPACITY: '1',
  });

  assert.equal(config.mode, 'live');
  assert.equal(config.refreshToken, 'test-secret');
  assert.deepEqual(config.vehicleIds, ['1001', '1002']);
  assert.equal(config.poll.onlineIntervalMs, 30_000);
  assert.equal(config.wake.policy, 'wake-on-schedule');
  assert.equal(config.cache.staleMode, 'omit');
  assert.deepEqual(config.rateLimits.wake, { capacity: 1, refillPerMinute: 0.2, minIntervalMs: 60_000 });
});

test('blank environment values fall back to the defaults', () => {
  const config = getExporterConfig({ TESLA_MODE: 'simulated', POLL_ONLINE_INTERVAL_MS: '  ' });

  assert.equal(config.poll.onlineIntervalMs, 60_000);
});

test('environment values override the configuration file', () => {
  const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'tesla-exporter-'));
  const configPath = path.join(directory, 'exporter.json');
  fs.writeFileSync(
    configPath,
    JSON.stringify({
      mode: 'simulated',
      geofences: [{ location: 'Home', latitude: 52.37, longitude: 4.89, radiusMeters: 150 }],
      poll: { onlineIntervalMs: 45_000, asleepIntervalMs: 120_000 },
    }),
  );

  try {
    const config = getExporterConfig({
      EXPORTER_CONFIG_PATH: configPath,
      POLL_ONLINE_INTERVAL_MS: '30000',
    });

    assert.equal(config.mode, 'simulated');
    assert.equal(config.poll.onlineIntervalMs, 30_000);
    assert.equal(config.poll.asleepIntervalMs, 120_000);
    assert.deepEqual(config.geofences, [
      { location: 'Home', latitude: 52.37, longitude: 4.89, radiusMeters: 150 },
    ]);
  } finally {
    fs.rmSync(directory, { recursive: true, force: true });
  }
});

test('invalid values are rejected', () => {
  assert.throws(
    () =>
      getExporterConfig({
        TESLA_MODE: 'simulated',
        UNREACHABLE_BASE_MS: '600000',
        UNREACHABLE_MAX_MS: '60000',
      }),
    /unreachableMaxMs must not be lower than unreachableBaseMs/,
  );
  assert.throws(
    () => getExporterConfig({ TESLA_MODE: 'simulated', POLL_ONLINE_INTERVAL_MS: 'soon' }),
    ZodError,
  );
  assert.throws(() => getExporterConfig({ TESLA_MODE: 'simulated', STALE_MODE: 'hide' }), ZodError);
});

test('http settings default to the exporter port and metrics path', () => {
  const defaults = getAppConfig({});
  assert.equal(defaults.port, 9100);
  assert.equal(defaults.metricsPath, '/metrics');
  assert.equal(defaults.apiKey, null);

  const custom = getAppConfig({ PORT: '9200', METRICS_PATH: 'prometheus', API_KEY: 'test-secret' });
  assert.equal(custom.port, 9200);
  assert.equal(custom.metricsPath, '/prometheus');
  assert.equal(custom.apiKey, 'test-secret');
});
