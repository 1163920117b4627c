import type { ExporterConfig } from '../config/exporterConfig';
import type { VehicleApi } from '../integrations/vehicleApi';
import { mapTelemetryToSnapshot } from '../integrations/tesla/telemetryMapper';
import type { Device, DeviceView } from '../models/device';
import type { VehicleSummary } from '../models/telemetry';
import { applyOutcome, decideAction, recover, type PollAction } from '../rules/pollPolicy';
import {
  AuthError,
  RateLimitExceeded,
  UnauthorizedError,
  VehicleUnavailableError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { CredentialManager } from './credentialManager.service';
import type { DeviceRegistry } from './deviceRegistry.service';
import type { MetricCache } from './metricCache.service';
import type { EndpointClass, RateLimiter } from './rateLimiter.service';

export const PollOutcomeNames = [
  'published',
  'checked',
  'skipped',
  'woke',
  'deferred',
  'failed',
  'halted',
  'aborted',
] as const;

export type PollOutcomeName = (typeof PollOutcomeNames)[number];

export type PollResult =
  | {
      outcome: Exclude<PollOutcomeName, 'deferred' | 'halted'>;
      device: DeviceView;
    }
  | { outcome: 'deferred'; device: DeviceView; retryAt: number }
  | { outcome: 'halted'; device: DeviceView; error: AuthError };

export type PollerConfig = Pick<ExporterConfig, 'poll' | 'wake' | 'geofences'>;

export type VehiclePollerDeps = {
  api: VehicleApi;
  credentials: CredentialManager;
  rateLimiter: RateLimiter;
  registry: DeviceRegistry;
  cache: MetricCache;
  config: PollerConfig;
  now?: () => number;
};

/**
 * Runs one poll cycle for one device: asks the policy what to do, performs at most the
 * upstream calls that action needs, then records the outcome on the device.
 */
export class VehiclePoller {
  private readonly deps: VehiclePollerDeps;

  private readonly now: () => number;

  private readonly counts: Record<PollOutcomeName, number>;

  constructor(deps: VehiclePollerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.counts = {
      published: 0,
      checked: 0,
      skipped: 0,
      woke: 0,
      deferred: 0,
      failed: 0,
      halted: 0,
      aborted: 0,
    };
  }

  pollCounts(): Readonly<Record<PollOutcomeName, number>> {
    return { ...this.counts };
  }

  async poll(deviceId: string, signal?: AbortSignal): Promise<PollResult> {
    const { registry, config } = this.deps;
    const stored = registry.get(deviceId);
    if (!stored) {
      throw new Error(`Unknown device ${deviceId}`);
    }

    let device: Device = { ...stored };
    const startedAt = this.now();
    let action = decideAction(device, startedAt, config);

    if (action.type === 'recover') {
      device = this.save(recover(device, startedAt));
      logger.info({ deviceId }, 'unreachable cooldown elapsed; rediscovering vehicle');
      action = decideAction(device, startedAt, config);
    }

    const result = await this.execute(device, action, signal);
    this.counts[result.outcome] += 1;
    logger.debug(
      { deviceId, action: action.type, outcome: result.outcome, state: result.device.state },
      'poll cycle finished',
    );
    return result;
  }

  private async execute(
    initial: Device,
    action: PollAction,
    signal?: AbortSignal,
  ): Promise<PollResult> {
    const { config } = this.deps;
    let device = initial;

    try {
      switch (action.type) {
        case 'skip':
          device = this.save(applyOutcome(device, { kind: 'skipped' }, this.now(), config));
          return { outcome: 'skipped', device };
        case 'wake': {
          const summary = await this.request('wake', signal, (token) =>
            this.deps.api.wakeUp(token, device.id, signal),
          );
          device = this.save(applyOutcome(device, { kind: 'woke', summary }, this.now(), config));
          logger.info({ deviceId: device.id }, 'wake requested');
          return { outcome: 'woke', device };
        }
        case 'check-presence': {
          const summary = await this.request('telemetry', signal, (token) =>
            this.deps.api.getVehicle(token, device.id, signal),
          );
          const cameFromUnknown = device.state === 'unknown';
          device = this.save(
            applyOutcome(device, { kind: 'presence', summary }, this.now(), config),
          );
          this.logPresence(device, summary);

          if (cameFromUnknown && device.state === 'online' && !device.inService) {
            return await this.fetchTelemetry(device, signal);
          }
          return { outcome: 'checked', device };
        }
        case 'fetch-telemetry':
          return await this.fetchTelemetry(device, signal);
        case 'recover':
          // decideAction never returns recover for a device in the unknown state.
          throw new Error(`Unexpected recover action for ${device.id}`);
        default: {
          const exhaustive: never = action;
          return exhaustive;
        }
      }
    } catch (error) {
      // fetchTelemetry may have saved progress before failing; start from the latest record.
      const latest = this.deps.registry.get(initial.id);
      return this.handleError(latest ? { ...latest } : device, error, signal);
    }
  }

  private async fetchTelemetry(device: Device, signal?: AbortSignal): Promise<PollResult> {
    const { api, cache, config } = this.deps;
    const telemetry = await this.request('telemetry', signal, (token) =>
      api.getVehicleData(token, device.id, signal),
    );

    if (signal?.aborted) {
      return { outcome: 'aborted', device };
    }

    const previous = cache.get(device.id);
    const snapshot = mapTelemetryToSnapshot(telemetry, {
      geofences: config.geofences,
      previousLocation: previous?.location ?? null,
    });
    cache.publish(device.id, snapshot);

    const updated = this.save(
      applyOutcome(
        device,
        {
          kind: 'telemetry',
          summary: telemetry.summary,
          charging: snapshot.activity.charging,
          driving: snapshot.activity.driving,
        },
        this.now(),
        config,
      ),
    );
    return { outcome: 'published', device: updated };
  }

  private async request<T>(
    endpointClass: EndpointClass,
    signal: AbortSignal | undefined,
    call: (accessToken: string) => Promise<T>,
  ): Promise<T> {
    const token = await this.deps.credentials.getValidToken(signal);
    const permit = this.deps.rateLimiter.acquire(endpointClass);
    if (!permit.granted) {
      throw new RateLimitExceeded(`${endpointClass} request budget exhausted`, permit.retryAt);
    }

    return call(token);
  }

  private handleError(device: Device, error: unknown, signal?: AbortSignal): PollResult {
    const { cache, config, credentials } = this.deps;

    if (signal?.aborted) {
      return { outcome: 'aborted', device };
    }

    if (error instanceof AuthError) {
      return { outcome: 'halted', device, error };
    }

    if (error instanceof RateLimitExceeded) {
      logger.info(
        { deviceId: device.id, retryAt: new Date(error.retryAt).toISOString() },
        'poll deferred by rate limit',
      );
      return { outcome: 'deferred', device, retryAt: error.retryAt };
    }

    if (error instanceof VehicleUnavailableError) {
      const updated = this.save(applyOutcome(device, { kind: 'unavailable' }, this.now(), config));
      logger.info({ deviceId: device.id, state: updated.state }, 'vehicle unavailable');
      return { outcome: 'checked', device: updated };
    }

    if (error instanceof UnauthorizedError) {
      credentials.invalidate();
    }

    const updated = this.save(applyOutcome(device, { kind: 'failure' }, this.now(), config));
    logger.warn(
      {
        deviceId: device.id,
        consecutiveFailures: updated.consecutiveFailures,
        error,
      },
      'poll failed',
    );

    if (updated.state === 'unreachable' && device.state !== 'unreachable') {
      cache.markStale(device.id);
      logger.warn(
        { deviceId: device.id, unreachableCount: updated.unreachableCount },
        'vehicle marked unreachable',
      );
    }

    return { outcome: 'failed', device: updated };
  }

  private logPresence(device: Device, summary: VehicleSummary): void {
    logger.debug(
      { deviceId: device.id, reported: summary.state, state: device.state, inService: summary.inService },
      'presence checked',
    );
  }

  private save(device: Device): Device {
    this.deps.registry.update(device);
    return device;
  }
}
