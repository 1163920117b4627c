import { z } from 'zod';

import type {
  UpstreamVehicleState,
  VehicleSummary,
  VehicleTelemetry,
} from '../../models/telemetry';

// Unknown fields are stripped by zod's default object parsing, so provider additions
// never break decoding.

const numeric = z.number().finite().nullish();
const text = z.string().nullish();
const identifier = z.union([z.number(), z.string()]);

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  token_type: z.string().nullish(),
  expires_in: z.number().positive(),
});

const vehicleSummarySchema = z.object({
  id: identifier,
  id_s: z.string().nullish(),
  vehicle_id: identifier.nullish(),
  vin: text,
  display_name: text,
  state: z.string(),
  in_service: z.boolean().nullish(),
});

const chargeStateSchema = z.object({
  battery_level: numeric,
  battery_range: numeric,
  charge_limit_soc: numeric,
  charge_energy_added: numeric,
  charger_power: numeric,
  charger_voltage: numeric,
  charger_actual_current: numeric,
  charging_state: text,
  charge_port_latch: text,
});

const driveStateSchema = z.object({
  latitude: numeric,
  longitude: numeric,
  speed: numeric,
  shift_state: text,
  power: numeric,
});

const vehicleStateSchema = z.object({
  odometer: numeric,
});

const climateStateSchema = z.object({
  inside_temp: numeric,
  outside_temp: numeric,
});

const vehicleDataSchema = vehicleSummarySchema.extend({
  charge_state: chargeStateSchema.nullish(),
  drive_state: driveStateSchema.nullish(),
  vehicle_state: vehicleStateSchema.nullish(),
  climate_state: climateStateSchema.nullish(),
});

export const envelope = <T extends z.ZodTypeAny>(schema: T) => z.object({ response: schema });

export const vehicleListResponseSchema = envelope(z.array(vehicleSummarySchema));
export const vehicleResponseSchema = envelope(vehicleSummarySchema);
export const vehicleDataResponseSchema = envelope(vehicleDataSchema);

type RawVehicleSummary = z.infer<typeof vehicleSummarySchema>;
type RawVehicleData = z.infer<typeof vehicleDataSchema>;

const AWAKE_STATES = new Set(['online', 'charging', 'driving', 'updating']);

export const toVehicleState = (state: string): UpstreamVehicleState => {
  const normalized = state.trim().toLowerCase();
  if (AWAKE_STATES.has(normalized)) {
    return 'online';
  }

  if (normalized === 'asleep' || normalized === 'offline') {
    return normalized;
  }

  return 'unknown';
};

export const toVehicleSummary = (raw: RawVehicleSummary): VehicleSummary => ({
  id: raw.id_s ?? String(raw.id),
  vehicleId: raw.vehicle_id === null || raw.vehicle_id === undefined ? null : String(raw.vehicle_id),
  vin: raw.vin ?? null,
  displayName: raw.display_name ?? null,
  state: toVehicleState(raw.state),
  inService: raw.in_service ?? false,
});

export const toVehicleTelemetry = (raw: RawVehicleData, fetchedAt: number): VehicleTelemetry => ({
  summary: toVehicleSummary(raw),
  charge: raw.charge_state
    ? {
        batteryLevel: raw.charge_state.battery_level ?? null,
        batteryRangeMiles: raw.charge_state.battery_range ?? null,
        chargeLimitSoc: raw.charge_state.charge_limit_soc ?? null,
        chargeEnergyAddedKwh: raw.charge_state.charge_energy_added ?? null,
        chargerPowerKw: raw.charge_state.charger_power ?? null,
        chargerVoltage: raw.charge_state.charger_voltage ?? null,
        chargerActualCurrent: raw.charge_state.charger_actual_current ?? null,
        chargingState: raw.charge_state.charging_state ?? null,
        chargePortLatch: raw.charge_state.charge_port_latch ?? null,
      }
    : null,
  drive: raw.drive_state
    ? {
        latitude: raw.drive_state.latitude ?? null,
        longitude: raw.drive_state.longitude ?? null,
        speedMph: raw.drive_state.speed ?? null,
        shiftState: raw.drive_state.shift_state ?? null,
        powerKw: raw.drive_state.power ?? null,
      }
    : null,
  odometerMiles: raw.vehicle_state?.odometer ?? null,
  insideTempC: raw.climate_state?.inside_temp ?? null,
  outsideTempC: raw.climate_state?.outside_temp ?? null,
  fetchedAt,
});
