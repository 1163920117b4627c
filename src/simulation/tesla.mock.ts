import type { VehicleApi } from '../integrations/vehicleApi';
import type {
  TokenGrant,
  VehicleSummary,
  VehicleTelemetry,
} from '../models/telemetry';
import { UpstreamError, VehicleUnavailableError } from '../utils/errors';

export type SimulationSample = {
  asleep: boolean;
  batteryLevel: number;
  batteryRangeMiles: number;
  chargingState: 'Disconnected' | 'Charging' | 'Complete' | 'Stopped';
  chargerPowerKw: number;
  chargeEnergyAddedKwh: number;
  chargePortLatch: 'Engaged' | 'Disengaged';
  speedMph: number | null;
  shiftState: 'P' | 'D' | 'R' | 'N' | null;
  latitude: number;
  longitude: number;
  odometerMiles: number;
  insideTempC: number;
  outsideTempC: number;
};

export type SimulatedVehicle = {
  id: string;
  vehicleId: string;
  vin: string;
  displayName: string;
  samples: SimulationSample[];
};

const COMMUTER: SimulatedVehicle = {
  id: '1000000000000001',
  vehicleId: '200000001',
  vin: '5YJ3E1EA0SIM00001',
  displayName: 'Commuter',
  samples: [
    {
      asleep: false,
      batteryLevel: 81,
      batteryRangeMiles: 245.3,
      chargingState: 'Disconnected',
      chargerPowerKw: 0,
      chargeEnergyAddedKwh: 0,
      chargePortLatch: 'Disengaged',
      speedMph: 31,
      shiftState: 'D',
      latitude: 52.3731,
      longitude: 4.8922,
      odometerMiles: 15230.2,
      insideTempC: 21.5,
      outsideTempC: 14,
    },
    {
      asleep: false,
      batteryLevel: 79,
      batteryRangeMiles: 239.1,
      chargingState: 'Disconnected',
      chargerPowerKw: 0,
      chargeEnergyAddedKwh: 0,
      chargePortLatch: 'Disengaged',
      speedMph: null,
      shiftState: 'P',
      latitude: 52.377956,
      longitude: 4.89707,
      odometerMiles: 15236.8,
      insideTempC: 22,
      outsideTempC: 14.5,
    },
    {
      asleep: false,
      batteryLevel: 83,
      batteryRangeMiles: 251.7,
      chargingState: 'Charging',
      chargerPowerKw: 11,
      chargeEnergyAddedKwh: 3.2,
      chargePortLatch: 'Engaged',
      speedMph: null,
      shiftState: 'P',
      latitude: 52.377956,
      longitude: 4.89707,
      odometerMiles: 15236.8,
      insideTempC: 19,
      outsideTempC: 13,
    },
    {
      asleep: true,
      batteryLevel: 90,
      batteryRangeMiles: 272.4,
      chargingState: 'Complete',
      chargerPowerKw: 0,
      chargeEnergyAddedKwh: 7.9,
      chargePortLatch: 'Engaged',
      speedMph: null,
      shiftState: 'P',
      latitude: 52.377956,
      longitude: 4.89707,
      odometerMiles: 15236.8,
      insideTempC: 16,
      outsideTempC: 12,
    },
  ],
};

const WEEKEND_CAR: SimulatedVehicle = {
  id: '1000000000000002',
  vehicleId: '200000002',
  vin: '5YJYGDEE0SIM00002',
  displayName: 'Weekend',
  samples: [
    {
      asleep: true,
      batteryLevel: 64,
      batteryRangeMiles: 198.4,
      chargingState: 'Disconnected',
      chargerPowerKw: 0,
      chargeEnergyAddedKwh: 0,
      chargePortLatch: 'Disengaged',
      speedMph: null,
      shiftState: 'P',
      latitude: 52.0907,
      longitude: 5.1214,
      odometerMiles: 8120.5,
      insideTempC: 12,
      outsideTempC: 11,
    },
    {
      asleep: false,
      batteryLevel: 63,
      batteryRangeMiles: 195.2,
      chargingState: 'Disconnected',
      chargerPowerKw: 0,
      chargeEnergyAddedKwh: 0,
      chargePortLatch: 'Disengaged',
      speedMph: 68,
      shiftState: 'D',
      latitude: 52.1561,
      longitude: 5.3878,
      odometerMiles: 8141.9,
      insideTempC: 20,
      outsideTempC: 11,
    },
  ],
};

export const DEFAULT_SIMULATED_VEHICLES: SimulatedVehicle[] = [COMMUTER, WEEKEND_CAR];

export type SimulatedVehicleApiOptions = {
  vehicles?: SimulatedVehicle[];
  /** How long each sample stays current. */
  sampleIntervalMs?: number;
  /** How long a woken vehicle stays online regardless of its sample. */
  awakeForMs?: number;
  now?: () => number;
};

/**
 * In-process upstream for local runs. Vehicles step through their samples on the wall
 * clock; a sample flagged `asleep` answers presence checks with `asleep` and data calls
 * with `VehicleUnavailableError`, exactly like a parked car would.
 */
export class SimulatedVehicleApi implements VehicleApi {
  private readonly vehicles: Map<string, SimulatedVehicle>;

  private readonly sampleIntervalMs: number;

  private readonly awakeForMs: number;

  private readonly now: () => number;

  private readonly startedAt: number;

  private readonly wokenAt = new Map<string, number>();

  constructor(options: SimulatedVehicleApiOptions = {}) {
    const vehicles = options.vehicles ?? DEFAULT_SIMULATED_VEHICLES;
    this.vehicles = new Map(vehicles.map((vehicle) => [vehicle.id, vehicle]));
    this.sampleIntervalMs = options.sampleIntervalMs ?? 5 * 60_000;
    this.awakeForMs = options.awakeForMs ?? 10 * 60_000;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  async refreshToken(_refreshToken: string, signal?: AbortSignal): Promise<TokenGrant> {
    signal?.throwIfAborted();
    return { accessToken: 'simulated-access-token', refreshToken: null, expiresInSeconds: 8 * 3600 };
  }

  async listVehicles(_accessToken: string, signal?: AbortSignal): Promise<VehicleSummary[]> {
    signal?.throwIfAborted();
    return [...this.vehicles.values()].map((vehicle) => this.summarize(vehicle));
  }

  async getVehicle(_accessToken: string, id: string, signal?: AbortSignal): Promise<VehicleSummary> {
    signal?.throwIfAborted();
    return this.summarize(this.find(id));
  }

  async getVehicleData(
    _accessToken: string,
    id: string,
    signal?: AbortSignal,
  ): Promise<VehicleTelemetry> {
    signal?.throwIfAborted();
    const vehicle = this.find(id);
    const summary = this.summarize(vehicle);
    if (summary.state !== 'online') {
      throw new VehicleUnavailableError(`Vehicle ${id} is ${summary.state}.`, 408);
    }

    const sample = this.currentSample(vehicle);
    return {
      summary,
      charge: {
        batteryLevel: sample.batteryLevel,
        batteryRangeMiles: sample.batteryRangeMiles,
        chargeLimitSoc: 90,
        chargeEnergyAddedKwh: sample.chargeEnergyAddedKwh,
        chargerPowerKw: sample.chargerPowerKw,
        chargerVoltage: sample.chargerPowerKw > 0 ? 230 : 0,
        chargerActualCurrent: sample.chargerPowerKw > 0 ? 16 : 0,
        chargingState: sample.chargingState,
        chargePortLatch: sample.chargePortLatch,
      },
      drive: {
        latitude: sample.latitude,
        longitude: sample.longitude,
        speedMph: sample.speedMph,
        shiftState: sample.shiftState,
        powerKw: sample.speedMph ? 18 : 0,
      },
      odometerMiles: sample.odometerMiles,
      insideTempC: sample.insideTempC,
      outsideTempC: sample.outsideTempC,
      fetchedAt: this.now(),
    };
  }

  async wakeUp(_accessToken: string, id: string, signal?: AbortSignal): Promise<VehicleSummary> {
    signal?.throwIfAborted();
    const vehicle = this.find(id);
    this.wokenAt.set(id, this.now());
    return this.summarize(vehicle);
  }

  private find(id: string): SimulatedVehicle {
    const vehicle = this.vehicles.get(id);
    if (!vehicle) {
      throw new UpstreamError(`Vehicle ${id} is not known to this account.`, 404);
    }
    return vehicle;
  }

  private currentSample(vehicle: SimulatedVehicle): SimulationSample {
    const index =
      Math.floor((this.now() - this.startedAt) / this.sampleIntervalMs) % vehicle.samples.length;
    return vehicle.samples[index];
  }

  private summarize(vehicle: SimulatedVehicle): VehicleSummary {
    const wokenAt = this.wokenAt.get(vehicle.id);
    const awake =
      (wokenAt !== undefined && this.now() - wokenAt < this.awakeForMs) ||
      !this.currentSample(vehicle).asleep;

    return {
      id: vehicle.id,
      vehicleId: vehicle.vehicleId,
      vin: vehicle.vin,
      displayName: vehicle.displayName,
      state: awake ? 'online' : 'asleep',
      inService: false,
    };
  }
}
