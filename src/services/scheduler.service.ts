import type { ExporterConfig } from '../config/exporterConfig';
import type { VehicleApi } from '../integrations/vehicleApi';
import { nextDelayMs } from '../rules/pollPolicy';
import { AuthError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { CredentialManager } from './credentialManager.service';
import type { DeviceRegistration, DeviceRegistry } from './deviceRegistry.service';
import type { MetricCache } from './metricCache.service';
import type { PollResult, VehiclePoller } from './vehiclePoller.service';

export type SchedulerConfig = Pick<ExporterConfig, 'poll' | 'wake' | 'vehicleIds' | 'shutdownGraceMs'>;

export type SchedulerDeps = {
  api: Pick<VehicleApi, 'listVehicles'>;
  credentials: Pick<CredentialManager, 'getValidToken'>;
  registry: DeviceRegistry;
  cache: Pick<MetricCache, 'register'>;
  poller: Pick<VehiclePoller, 'poll'>;
  config: SchedulerConfig;
  now?: () => number;
};

export type SchedulerStatus = {
  running: boolean;
  halted: boolean;
  haltReason: string | null;
  inflight: number;
  scheduled: number;
};


/**
 * One timer chain per device. Each device runs at most one cycle at a time and
 * reschedules itself from the state the cycle left it in.
 */
export class Scheduler {
  private readonly deps: SchedulerDeps;

  private readonly now: () => number;

  private readonly timers = new Map<string, NodeJS.Timeout>();

  private readonly inflight = new Map<string, Promise<PollResult>>();

  private discoveryTimer: NodeJS.Timeout | null = null;

  private controller = new AbortController();

  private running = false;

  private haltedBy: AuthError | null = null;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.running = true;
    this.controller = new AbortController();
    await this.discover();

    if (this.running && !this.haltedBy) {
      this.discoveryTimer = setInterval(() => {
        this.discover().catch((error) => {
          logger.error({ error }, 'vehicle discovery crashed');
        });
      }, this.deps.config.poll.discoveryIntervalMs);
    }
  }

  /**
   * Runs one cycle for a device. Resolves to `null` without polling when the device's
   * previous cycle has not finished yet.
   */
  async runCycle(deviceId: string): Promise<PollResult | null> {
    if (this.inflight.has(deviceId)) {
      logger.debug({ deviceId }, 'previous poll cycle still running');
      return null;
    }

    const cycle = this.deps.poller.poll(deviceId, this.controller.signal);
    this.inflight.set(deviceId, cycle);
    try {
      const result = await cycle;
      if (result.outcome === 'halted') {
        this.halt(result.error);
      }
      return result;
    } finally {
      this.inflight.delete(deviceId);
    }
  }

  /** Lists vehicles and starts polling the ones not seen before. */
  async discover(): Promise<void> {
    if (!this.running || this.haltedBy) {
      return;
    }

    const { api, credentials, config } = this.deps;
    const signal = this.controller.signal;
    const allowed = new Set(config.vehicleIds);

    try {
      const token = await credentials.getValidToken(signal);
      const vehicles = await api.listVehicles(token, signal);
      // Allow-list entries are upstream ids, the same key the fallback below registers.
      const selected =
        allowed.size > 0 ? vehicles.filter((vehicle) => allowed.has(vehicle.id)) : vehicles;

      selected.forEach((vehicle) =>
        this.track({
          id: vehicle.id,
          vehicleId: vehicle.vehicleId,
          vin: vehicle.vin,
          displayName: vehicle.displayName,
        }),
      );
      logger.info({ discovered: vehicles.length, tracked: selected.length }, 'vehicles discovered');
    } catch (error) {
      if (signal.aborted) {
        return;
      }

      if (error instanceof AuthError) {
        this.halt(error);
        return;
      }

      logger.warn(
        { error, configured: config.vehicleIds.length },
        'vehicle discovery failed; falling back to configured vehicle ids',
      );
      config.vehicleIds.forEach((id) => this.track({ id }));
    }
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      halted: this.haltedBy !== null,
      haltReason: this.haltedBy?.message ?? null,
      inflight: this.inflight.size,
      scheduled: this.timers.size,
    };
  }

  /**
   * Stops scheduling, aborts in-flight requests and waits up to `graceMs` for running
   * cycles to settle. Resolves to `false` when the grace period ran out first.
   */
  async stop(graceMs: number = this.deps.config.shutdownGraceMs): Promise<boolean> {
    this.running = false;
    this.clearTimers();
    this.controller.abort(new Error('Scheduler stopped'));

    const pending = [...this.inflight.values()].map((cycle) =>
      cycle.then(
        () => undefined,
        () => undefined,
      ),
    );
    if (pending.length === 0) {
      return true;
    }

    let graceTimer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      graceTimer = setTimeout(() => resolve(false), graceMs);
    });

    const drained = await Promise.race([Promise.all(pending).then(() => true), expired]);
    clearTimeout(graceTimer);
    if (!drained) {
      logger.warn({ inflight: this.inflight.size }, 'poll cycles still running after grace period');
    }
    return drained;
  }

  private track(registration: DeviceRegistration): void {
    const { device, created } = this.deps.registry.register(registration);
    this.deps.cache.register(device.id);
    if (created) {
      this.schedule(device.id, 0);
    }
  }

  private schedule(deviceId: string, delayMs: number): void {
    if (!this.running || this.haltedBy) {
      return;
    }

    const existing = this.timers.get(deviceId);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.timers.delete(deviceId);
      this.fire(deviceId);
    }, delayMs);
    this.timers.set(deviceId, timer);
  }

  private fire(deviceId: string): void {
    this.runCycle(deviceId)
      .then((result) => {
        const delayMs = this.delayAfter(deviceId, result);
        if (delayMs !== null) {
          this.schedule(deviceId, delayMs);
        }
      })
      .catch((error) => {
        logger.error({ error, deviceId }, 'poll cycle crashed');
        this.schedule(deviceId, this.deps.config.poll.onlineIntervalMs);
      });
  }

  private delayAfter(deviceId: string, result: PollResult | null): number | null {
    const now = this.now();
    if (result === null) {
      const device = this.deps.registry.get(deviceId);
      return device ? nextDelayMs(device, now, this.deps.config) : null;
    }

    switch (result.outcome) {
      case 'deferred':
        return Math.max(result.retryAt - now, 0);
      case 'halted':
      case 'aborted':
        return null;
      default:
        return nextDelayMs(result.device, now, this.deps.config);
    }
  }

  private halt(error: AuthError): void {
    if (this.haltedBy) {
      return;
    }

    this.haltedBy = error;
    this.clearTimers();
    logger.error({ error }, 'refresh token rejected; all polling halted');
  }

  private clearTimers(): void {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    if (this.discoveryTimer) {
      clearInterval(this.discoveryTimer);
      this.discoveryTimer = null;
    }
  }
}
