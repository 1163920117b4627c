export type UpstreamVehicleState = 'online' | 'asleep' | 'offline' | 'unknown';

export type VehicleSummary = {
  id: string;
  vehicleId: string | null;
  vin: string | null;
  displayName: string | null;
  state: UpstreamVehicleState;
  inService: boolean;
};

export type TokenGrant = {
  accessToken: string;
  /** Absent when the provider keeps the previous refresh token valid. */
  refreshToken: string | null;
  expiresInSeconds: number;
};

export type ChargeTelemetry = {
  batteryLevel: number | null;
  batteryRangeMiles: number | null;
  chargeLimitSoc: number | null;
  chargeEnergyAddedKwh: number | null;
  chargerPowerKw: number | null;
  chargerVoltage: number | null;
  chargerActualCurrent: number | null;
  chargingState: string | null;
  chargePortLatch: string | null;
};

export type DriveTelemetry = {
  latitude: number | null;
  longitude: number | null;
  speedMph: number | null;
  shiftState: string | null;
  powerKw: number | null;
};

export type VehicleTelemetry = {
  summary: VehicleSummary;
  charge: ChargeTelemetry | null;
  drive: DriveTelemetry | null;
  odometerMiles: number | null;
  insideTempC: number | null;
  outsideTempC: number | null;
  fetchedAt: number;
};
