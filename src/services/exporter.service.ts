import type { StaleMode } from '../config/exporterConfig';
import { DeviceStates, type DeviceView } from '../models/device';
import type { MetricType } from '../models/metrics';
import type { CredentialManager } from './credentialManager.service';
import type { DeviceRegistry } from './deviceRegistry.service';
import type { MetricCache } from './metricCache.service';
import { EndpointClasses, type RateLimiter } from './rateLimiter.service';
import { PollOutcomeNames, type VehiclePoller } from './vehiclePoller.service';

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

type Labels = Readonly<Record<string, string>>;

type Family = {
  help: string;
  type: MetricType;
  lines: string[];
};

export type ExporterDeps = {
  registry: Pick<DeviceRegistry, 'list'>;
  cache: Pick<MetricCache, 'readAll'>;
  rateLimiter: Pick<RateLimiter, 'snapshot'>;
  credentials: Pick<CredentialManager, 'status'>;
  poller: Pick<VehiclePoller, 'pollCounts'>;
  staleMode: StaleMode;
  now?: () => number;
};

export const escapeLabelValue = (value: string): string =>
  value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');

const escapeHelp = (help: string): string => help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');

export const formatValue = (value: number): string => {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Number.POSITIVE_INFINITY) {
    return '+Inf';
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return '-Inf';
  }
  return String(value);
};

const formatLabels = (labels: Labels): string => {
  const parts = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
};

/**
 * Availability as the dashboards expect it: 1 online, 0 asleep, -1 offline or
 * unreachable, -2 in service.
 */
export const availabilityOf = (device: DeviceView): number => {
  if (device.inService) {
    return -2;
  }

  switch (device.state) {
    case 'online':
      return 1;
    case 'asleep':
    case 'waking':
      return device.lastReportedState === 'offline' ? -1 : 0;
    case 'unknown':
    case 'unreachable':
      return -1;
    default: {
      const exhaustive: never = device.state;
      return exhaustive;
    }
  }
};

/** Collects samples grouped by family so each family gets one HELP/TYPE block. */
class FamilyWriter {
  private readonly families = new Map<string, Family>();

  add(name: string, help: string, type: MetricType, value: number, labels: Labels = {}): void {
    let family = this.families.get(name);
    if (!family) {
      family = { help, type, lines: [] };
      this.families.set(name, family);
    }

    family.lines.push(`${name}${formatLabels(labels)} ${formatValue(value)}`);
  }

  toString(): string {
    const lines: string[] = [];
    for (const [name, family] of this.families) {
      lines.push(`# HELP ${name} ${escapeHelp(family.help)}`);
      lines.push(`# TYPE ${name} ${family.type}`);
      lines.push(...family.lines);
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }
}

/**
 * Renders the cache and device registry in the Prometheus text exposition format.
 * Rendering only reads in-memory state; it never triggers a poll.
 */
export class Exporter {
  private readonly deps: ExporterDeps;

  constructor(deps: ExporterDeps) {
    this.deps = deps;
  }

  render(now: number = (this.deps.now ?? Date.now)()): string {
    const { registry, cache, rateLimiter, credentials, poller, staleMode } = this.deps;
    const writer = new FamilyWriter();
    const entries = new Map(cache.readAll(now).map((entry) => [entry.deviceId, entry]));

    for (const device of registry.list()) {
      const labels: Labels = {
        vehicle_id: device.vehicleId ?? device.id,
        vin: device.vin ?? '',
        display_name: device.displayName,
      };
      const entry = entries.get(device.id);
      const snapshot = entry?.snapshot ?? null;
      const stale = entry?.stale ?? false;

      writer.add('tesla_vehicle_info', 'Vehicle identity.', 'gauge', 1, labels);
      for (const state of DeviceStates) {
        writer.add(
          'tesla_vehicle_state',
          'Lifecycle state of the vehicle as tracked by the exporter.',
          'gauge',
          device.state === state ? 1 : 0,
          { ...labels, state },
        );
      }
      writer.add(
        'tesla_vehicle_availability',
        'Availability: 1 online, 0 asleep, -1 offline or unreachable, -2 in service.',
        'gauge',
        availabilityOf(device),
        labels,
      );
      writer.add(
        'tesla_vehicle_consecutive_failures',
        'Consecutive failed poll cycles.',
        'gauge',
        device.consecutiveFailures,
        labels,
      );
      writer.add(
        'tesla_vehicle_last_successful_poll_timestamp_seconds',
        'Unix time of the last successful telemetry poll, 0 if none.',
        'gauge',
        device.lastSuccessfulPollAt === null ? 0 : device.lastSuccessfulPollAt / 1000,
        labels,
      );
      writer.add(
        'tesla_vehicle_snapshot_present',
        'Whether a telemetry snapshot has ever been captured.',
        'gauge',
        snapshot ? 1 : 0,
        labels,
      );
      writer.add(
        'tesla_vehicle_snapshot_stale',
        'Whether the cached snapshot is stale.',
        'gauge',
        stale ? 1 : 0,
        labels,
      );

      if (!entry?.snapshot || entry.ageMs === null) {
        continue;
      }

      writer.add(
        'tesla_vehicle_snapshot_age_seconds',
        'Age of the cached snapshot in seconds.',
        'gauge',
        entry.ageMs / 1000,
        labels,
      );

      if (stale && staleMode === 'omit') {
        continue;
      }

      for (const sample of entry.snapshot.samples) {
        writer.add(sample.name, sample.help, sample.type, sample.value, {
          ...labels,
          ...sample.labels,
        });
      }
    }

    writer.add(
      'tesla_exporter_auth_ok',
      'Whether the refresh token is still accepted.',
      'gauge',
      credentials.status().terminal ? 0 : 1,
    );

    const limits = rateLimiter.snapshot();
    for (const endpointClass of EndpointClasses) {
      writer.add(
        'tesla_exporter_rate_limit_tokens',
        'Tokens left in the request budget.',
        'gauge',
        limits[endpointClass].tokens,
        { endpoint_class: endpointClass },
      );
    }
    for (const endpointClass of EndpointClasses) {
      writer.add(
        'tesla_exporter_rate_limit_deferrals_total',
        'Requests deferred by the local rate limiter.',
        'counter',
        limits[endpointClass].deferrals,
        { endpoint_class: endpointClass },
      );
    }

    const counts = poller.pollCounts();
    for (const outcome of PollOutcomeNames) {
      writer.add('tesla_exporter_polls_total', 'Poll cycles by outcome.', 'counter', counts[outcome], {
        outcome,
      });
    }

    return writer.toString();
  }
}
