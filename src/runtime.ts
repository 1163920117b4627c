import type { ExporterConfig } from './config/exporterConfig';
import { TeslaApiClient } from './integrations/tesla/teslaApi.client';
import type { VehicleApi } from './integrations/vehicleApi';
import { CredentialManager } from './services/credentialManager.service';
import { DeviceRegistry } from './services/deviceRegistry.service';
import { Exporter } from './services/exporter.service';
import { MetricCache } from './services/metricCache.service';
import { RateLimiter } from './services/rateLimiter.service';
import { Scheduler } from './services/scheduler.service';
import { VehiclePoller } from './services/vehiclePoller.service';
import { SimulatedVehicleApi } from './simulation/tesla.mock';

const SIMULATED_REFRESH_TOKEN = 'simulated-refresh-token';

export type ExporterRuntime = {
  config: ExporterConfig;
  api: VehicleApi;
  credentials: CredentialManager;
  rateLimiter: RateLimiter;
  registry: DeviceRegistry;
  cache: MetricCache;
  poller: VehiclePoller;
  exporter: Exporter;
  scheduler: Scheduler;
};

export type RuntimeOptions = {
  /** Overrides the upstream picked from `config.mode`. */
  api?: VehicleApi;
  now?: () => number;
};

const createApi = (config: ExporterConfig, now: () => number): VehicleApi =>
  config.mode === 'simulated'
    ? new SimulatedVehicleApi({ now })
    : new TeslaApiClient({ timeoutMs: config.poll.requestTimeoutMs, now });

/** Wires the polling engine together. Nothing starts until `scheduler.start()`. */
export const createRuntime = (
  config: ExporterConfig,
  options: RuntimeOptions = {},
): ExporterRuntime => {
  const now = options.now ?? Date.now;
  const api = options.api ?? createApi(config, now);

  const credentials = new CredentialManager({
    api,
    refreshToken: config.refreshToken ?? SIMULATED_REFRESH_TOKEN,
    safetyMarginMs: config.credentials.safetyMarginMs,
    now,
  });
  const rateLimiter = new RateLimiter(config.rateLimits, now);
  const registry = new DeviceRegistry(now);
  const cache = new MetricCache(config.cache.staleAfterMs);
  const poller = new VehiclePoller({
    api,
    credentials,
    rateLimiter,
    registry,
    cache,
    config,
    now,
  });
  const exporter = new Exporter({
    registry,
    cache,
    rateLimiter,
    credentials,
    poller,
    staleMode: config.cache.staleMode,
    now,
  });
  const scheduler = new Scheduler({
    api,
    credentials,
    registry,
    cache,
    poller,
    config,
    now,
  });

  return { config, api, credentials, rateLimiter, registry, cache, poller, exporter, scheduler };
};
