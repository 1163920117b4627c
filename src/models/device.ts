import type { UpstreamVehicleState } from './telemetry';

export const DeviceStates = ['unknown', 'asleep', 'waking', 'online', 'unreachable'] as const;

export type DeviceState = (typeof DeviceStates)[number];

export type Device = {
  /** Id used in upstream URLs. */
  id: string;
  /** Secondary id the upstream uses for streaming and tagging. */
  vehicleId: string | null;
  vin: string | null;
  displayName: string;
  state: DeviceState;
  stateEnteredAt: number;
  /** Poll cycles run since entering the current state. */
  cyclesInState: number;
  lastSuccessfulPollAt: number | null;
  lastWakeAt: number | null;
  consecutiveFailures: number;
  /** Consecutive unreachable episodes; drives the exponential cooldown. */
  unreachableCount: number;
  inService: boolean;
  /** State string last reported by the upstream, kept to tell offline from asleep. */
  lastReportedState: UpstreamVehicleState | null;
  idleSince: number | null;
  suspendedAt: number | null;
};

export const DEFAULT_DISPLAY_NAME = 'Unknown';

export const createDevice = (
  input: { id: string; vehicleId?: string | null; vin?: string | null; displayName?: string | null },
  now: number,
): Device => ({
  id: input.id,
  vehicleId: input.vehicleId ?? null,
  vin: input.vin ?? null,
  displayName: input.displayName || DEFAULT_DISPLAY_NAME,
  state: 'unknown',
  stateEnteredAt: now,
  cyclesInState: 0,
  lastSuccessfulPollAt: null,
  lastWakeAt: null,
  consecutiveFailures: 0,
  unreachableCount: 0,
  inService: false,
  lastReportedState: null,
  idleSince: null,
  suspendedAt: null,
});

export type DeviceView = Readonly<Device>;
