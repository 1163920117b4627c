import type { Geofence } from '../../config/exporterConfig';
import type { MetricSample, MetricSnapshot } from '../../models/metrics';
import type { VehicleTelemetry } from '../../models/telemetry';
import { distanceInMeters } from '../../utils/geo';

export const LOCATION_OTHER = 'Other';

const METERS_PER_MILE = 1609.344;
const JOULES_PER_KWH = 1000 * 3600;
const DRIVING_SHIFT_STATES = new Set(['D', 'R', 'N']);

export const resolveLocation = (
  telemetry: VehicleTelemetry,
  geofences: Geofence[],
  previousLocation: string | null,
): string => {
  const latitude = telemetry.drive?.latitude;
  const longitude = telemetry.drive?.longitude;
  if (typeof latitude !== 'number' || typeof longitude !== 'number') {
    return previousLocation ?? LOCATION_OTHER;
  }

  const match = geofences.find(
    (geofence) =>
      distanceInMeters({ latitude, longitude }, geofence) < geofence.radiusMeters,
  );

  return match?.location ?? LOCATION_OTHER;
};

const gauge = (name: string, help: string, value: number | null | undefined): MetricSample[] =>
  typeof value === 'number' && Number.isFinite(value)
    ? [{ name, help, type: 'gauge', value }]
    : [];

export const mapTelemetryToSnapshot = (
  telemetry: VehicleTelemetry,
  options: { geofences: Geofence[]; previousLocation: string | null },
): MetricSnapshot => {
  const { charge, drive } = telemetry;
  const location = resolveLocation(telemetry, options.geofences, options.previousLocation);

  // Energy and power only count while the charge cable is latched.
  const latched = charge?.chargePortLatch === 'Engaged';
  const chargeEnergyJoules = latched ? (charge?.chargeEnergyAddedKwh ?? 0) * JOULES_PER_KWH : 0;
  const chargerPowerWatts = latched ? (charge?.chargerPowerKw ?? 0) * 1000 : 0;

  const samples: MetricSample[] = [
    ...gauge(
      'tesla_vehicle_battery_level_percent',
      'State of charge of the traction battery in percent.',
      charge?.batteryLevel,
    ),
    ...gauge(
      'tesla_vehicle_battery_range_meters',
      'Estimated remaining range in meters.',
      typeof charge?.batteryRangeMiles === 'number'
        ? charge.batteryRangeMiles * METERS_PER_MILE
        : null,
    ),
    ...gauge(
      'tesla_vehicle_charge_limit_percent',
      'Configured charge limit in percent.',
      charge?.chargeLimitSoc,
    ),
    ...(charge
      ? [
          {
            name: 'tesla_vehicle_charge_energy_added_joules',
            help: 'Energy added during the current charging session in joules.',
            type: 'gauge' as const,
            value: chargeEnergyJoules,
          },
          {
            name: 'tesla_vehicle_charger_power_watts',
            help: 'Power delivered by the charger in watts.',
            type: 'gauge' as const,
            value: chargerPowerWatts,
          },
        ]
      : []),
    ...gauge(
      'tesla_vehicle_charger_voltage_volts',
      'Charger voltage in volts.',
      charge?.chargerVoltage,
    ),
    ...gauge(
      'tesla_vehicle_charger_current_amperes',
      'Actual charger current in amperes.',
      charge?.chargerActualCurrent,
    ),
    ...(charge?.chargingState
      ? [
          {
            name: 'tesla_vehicle_charging_state',
            help: 'Charging state reported by the vehicle.',
            type: 'gauge' as const,
            value: 1,
            labels: { charging_state: charge.chargingState },
          },
        ]
      : []),
    ...(typeof telemetry.odometerMiles === 'number'
      ? [
          {
            name: 'tesla_vehicle_odometer_meters_total',
            help: 'Distance travelled by the vehicle in meters.',
            type: 'counter' as const,
            value: telemetry.odometerMiles * METERS_PER_MILE,
          },
        ]
      : []),
    ...(drive
      ? gauge(
          'tesla_vehicle_speed_kmh',
          'Vehicle speed in kilometers per hour.',
          (drive.speedMph ?? 0) * (METERS_PER_MILE / 1000),
        )
      : []),
    ...gauge(
      'tesla_vehicle_inside_temperature_celsius',
      'Cabin temperature in degrees Celsius.',
      telemetry.insideTempC,
    ),
    ...gauge(
      'tesla_vehicle_outside_temperature_celsius',
      'Outside temperature in degrees Celsius.',
      telemetry.outsideTempC,
    ),
    {
      name: 'tesla_vehicle_location',
      help: 'Geofence the vehicle is in, or Other.',
      type: 'gauge',
      value: 1,
      labels: { location },
    },
  ];

  const driving =
    (typeof drive?.speedMph === 'number' && drive.speedMph > 0) ||
    (drive?.shiftState ? DRIVING_SHIFT_STATES.has(drive.shiftState) : false);

  return {
    capturedAt: telemetry.fetchedAt,
    samples,
    activity: {
      charging: charge?.chargingState === 'Charging' || chargerPowerWatts > 0,
      driving,
    },
    location,
  };
};
