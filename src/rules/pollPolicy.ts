import type { ExporterConfig } from '../config/exporterConfig';
import type { Device, DeviceState } from '../models/device';
import type { VehicleSummary } from '../models/telemetry';

/**
 * Deterministic poll policy. Everything here is a pure function of the device record,
 * the current time and configuration, so the "never wake a sleeping car to fill a
 * dashboard" rules can be exercised without a network.
 */

export type PolicyConfig = Pick<ExporterConfig, 'poll' | 'wake'>;

export type PollAction =
  | { type: 'check-presence' }
  | { type: 'fetch-telemetry' }
  | { type: 'wake' }
  | { type: 'recover' }
  | { type: 'skip'; reason: 'asleep' | 'cooldown' };

export type PollOutcome =
  | { kind: 'presence'; summary: VehicleSummary }
  | { kind: 'telemetry'; summary: VehicleSummary; charging: boolean; driving: boolean }
  | { kind: 'unavailable' }
  | { kind: 'woke'; summary: VehicleSummary }
  | { kind: 'failure' }
  | { kind: 'skipped' };

/** Cycles a waking vehicle may answer "unavailable" before it is treated as asleep again. */
export const WAKING_MAX_CYCLES = 4;

export const allowedTransitions: Record<DeviceState, readonly DeviceState[]> = {
  unknown: ['unknown', 'asleep', 'online', 'unreachable'],
  asleep: ['asleep', 'waking'],
  waking: ['waking', 'online', 'asleep', 'unreachable'],
  online: ['online', 'asleep', 'unreachable'],
  unreachable: ['unreachable', 'unknown'],
};

export const unreachableCooldownMs = (device: Device, config: PolicyConfig): number => {
  const exponent = Math.max(device.unreachableCount - 1, 0);
  return Math.min(
    config.poll.unreachableBaseMs * Math.pow(2, exponent),
    config.poll.unreachableMaxMs,
  );
};

export const isWakeDue = (device: Device, now: number, config: PolicyConfig): boolean => {
  if (config.wake.policy !== 'wake-on-schedule') {
    return false;
  }

  const reference = Math.max(
    device.lastSuccessfulPollAt ?? device.stateEnteredAt,
    device.lastWakeAt ?? Number.NEGATIVE_INFINITY,
  );

  return now - reference >= config.wake.intervalMs;
};

/**
 * An idle online vehicle gets a window of presence checks only, so that it can fall
 * asleep. Telemetry resumes once the window has passed and the car is still online.
 */
export const isSuspended = (device: Device, now: number, config: PolicyConfig): boolean => {
  const { idleSuspendAfterMs, suspendDurationMs } = config.poll;
  if (device.state !== 'online' || idleSuspendAfterMs <= 0 || device.idleSince === null) {
    return false;
  }

  if (now - device.idleSince < idleSuspendAfterMs) {
    return false;
  }

  return device.suspendedAt === null || now - device.suspendedAt < suspendDurationMs;
};

export const decideAction = (device: Device, now: number, config: PolicyConfig): PollAction => {
  switch (device.state) {
    case 'unknown':
      return { type: 'check-presence' };
    case 'asleep':
      if (isWakeDue(device, now, config)) {
        return { type: 'wake' };
      }
      if ((device.cyclesInState + 1) % config.poll.presenceCheckEveryCycles === 0) {
        return { type: 'check-presence' };
      }
      return { type: 'skip', reason: 'asleep' };
    case 'waking':
      return { type: 'fetch-telemetry' };
    case 'online':
      // Vehicle data is not requested while the car is in service.
      return device.inService || isSuspended(device, now, config)
        ? { type: 'check-presence' }
        : { type: 'fetch-telemetry' };
    case 'unreachable':
      return now - device.stateEnteredAt >= unreachableCooldownMs(device, config)
        ? { type: 'recover' }
        : { type: 'skip', reason: 'cooldown' };
    default: {
      const exhaustive: never = device.state;
      return exhaustive;
    }
  }
};

const enter = (device: Device, state: DeviceState, now: number): Device => {
  if (!allowedTransitions[device.state].includes(state)) {
    throw new Error(`Illegal device transition ${device.state} -> ${state}`);
  }

  if (device.state === state) {
    return { ...device, cyclesInState: device.cyclesInState + 1 };
  }

  return { ...device, state, stateEnteredAt: now, cyclesInState: 0 };
};

const fromSummary = (device: Device, summary: VehicleSummary): Device => ({
  ...device,
  vehicleId: summary.vehicleId ?? device.vehicleId,
  vin: summary.vin ?? device.vin,
  displayName: summary.displayName || device.displayName,
  inService: summary.inService,
  lastReportedState: summary.state,
});

/** Restarts discovery for a device whose unreachable cooldown has elapsed. */
export const recover = (device: Device, now: number): Device => enter(device, 'unknown', now);

export const applyOutcome = (
  device: Device,
  outcome: PollOutcome,
  now: number,
  config: PolicyConfig,
): Device => {
  switch (outcome.kind) {
    case 'presence': {
      const updated = { ...fromSummary(device, outcome.summary), consecutiveFailures: 0 };
      if (outcome.summary.state === 'online' && device.state === 'asleep') {
        // Woke up on its own; telemetry is fetched on the next cycle.
        return enter(updated, 'waking', now);
      }
      if (outcome.summary.state === 'online') {
        const suspendedAt =
          device.state === 'online' && isSuspended(device, now, config)
            ? device.suspendedAt ?? now
            : device.suspendedAt;
        return { ...enter(updated, 'online', now), suspendedAt };
      }
      if (outcome.summary.state === 'asleep' || outcome.summary.state === 'offline') {
        return { ...enter(updated, 'asleep', now), idleSince: null, suspendedAt: null };
      }
      return enter(updated, device.state, now);
    }
    case 'telemetry': {
      const active = outcome.charging || outcome.driving;
      return {
        ...enter(fromSummary(device, outcome.summary), 'online', now),
        lastSuccessfulPollAt: now,
        consecutiveFailures: 0,
        unreachableCount: 0,
        idleSince: active ? null : device.idleSince ?? now,
        suspendedAt: null,
      };
    }
    case 'unavailable': {
      if (device.state === 'waking' && device.cyclesInState + 1 < WAKING_MAX_CYCLES) {
        return enter(device, 'waking', now);
      }
      return {
        ...enter(device, 'asleep', now),
        consecutiveFailures: 0,
        idleSince: null,
        suspendedAt: null,
      };
    }
    case 'woke':
      return { ...enter(fromSummary(device, outcome.summary), 'waking', now), lastWakeAt: now };
    case 'failure': {
      const consecutiveFailures = device.consecutiveFailures + 1;
      // A sleeping car stays asleep; failures are only counted for it.
      if (
        device.state !== 'unreachable' &&
        device.state !== 'asleep' &&
        consecutiveFailures >= config.poll.failureThreshold
      ) {
        return {
          ...enter(device, 'unreachable', now),
          consecutiveFailures,
          unreachableCount: device.unreachableCount + 1,
          idleSince: null,
          suspendedAt: null,
        };
      }
      return { ...enter(device, device.state, now), consecutiveFailures };
    }
    case 'skipped':
      return enter(device, device.state, now);
    default: {
      const exhaustive: never = outcome;
      return exhaustive;
    }
  }
};

/** Delay before the next cycle, derived from the lifecycle state. */
export const nextDelayMs = (device: Device, now: number, config: PolicyConfig): number => {
  switch (device.state) {
    case 'online':
    case 'unknown':
      return config.poll.onlineIntervalMs;
    case 'waking':
      return config.poll.wakingIntervalMs;
    case 'asleep':
      return config.poll.asleepIntervalMs;
    case 'unreachable':
      return Math.max(device.stateEnteredAt + unreachableCooldownMs(device, config) - now, 0);
    default: {
      const exhaustive: never = device.state;
      return exhaustive;
    }
  }
};
