import assert from 'node:assert/strict';
import test from 'node:test';

import {
  LOCATION_OTHER,
  mapTelemetryToSnapshot,
  resolveLocation,
} from '../src/integrations/tesla/telemetryMapper';
import type { MetricSnapshot } from '../src/models/metrics';
import { telemetry } from './helpers/fakes';

const home = { location: 'Home', latitude: 52.377956, longitude: 4.89707, radiusMeters: 100 };

const valueOf = (snapshot: MetricSnapshot, name: string): number | undefined =>
  snapshot.samples.find((sample) => sample.name === name)?.value;

const assertClose = (actual: number | undefined, expected: number): void => {
  assert.ok(actual !== undefined, 'sample missing');
  assert.ok(Math.abs(actual - expected) < 1e-6, `${actual} is not close to ${expected}`);
};

test('converts imperial and kWh readings to base units', () => {
  const snapshot = mapTelemetryToSnapshot(
    telemetry(1000, {
      charge: {
        batteryLevel: 64,
        batteryRangeMiles: 100,
        chargeLimitSoc: 90,
        chargeEnergyAddedKwh: 2,
        chargerPowerKw: 7,
        chargerVoltage: 230,
        chargerActualCurrent: 16,
        chargingState: 'Charging',
        chargePortLatch: 'Engaged',
      },
      drive: { latitude: 0, longitude: 0, speedMph: 60, shiftState: 'D', powerKw: 20 },
      odometerMiles: 1000,
    }),
    { geofences: [], previousLocation: null },
  );

  assert.equal(valueOf(snapshot, 'tesla_vehicle_battery_level_percent'), 64);
  assertClose(valueOf(snapshot, 'tesla_vehicle_battery_range_meters'), 160_934.4);
  assertClose(valueOf(snapshot, 'tesla_vehicle_odometer_meters_total'), 1_609_344);
  assertClose(valueOf(snapshot, 'tesla_vehicle_charge_energy_added_joules'), 7_200_000);
  assertClose(valueOf(snapshot, 'tesla_vehicle_charger_power_watts'), 7000);
  assertClose(valueOf(snapshot, 'tesla_vehicle_speed_kmh'), 96.56064);
  assert.equal(
    snapshot.samples.find((sample) => sample.name === 'tesla_vehicle_odometer_meters_total')?.type,
    'counter',
  );
  assert.deepEqual(
    snapshot.samples.find((sample) => sample.name === 'tesla_vehicle_charging_state')?.labels,
    { charging_state: 'Charging' },
  );
  assert.deepEqual(snapshot.activity, { charging: true, driving: true });
  assert.equal(snapshot.capturedAt, 1000);
});

test('energy and power read zero while the charge port latch is not engaged', () => {
  const base = telemetry(1000);
  const snapshot = mapTelemetryToSnapshot(
    {
      ...base,
      charge: base.charge && {
        ...base.charge,
        chargeEnergyAddedKwh: 5,
        chargerPowerKw: 11,
        chargePortLatch: 'Disengaged',
      },
    },
    { geofences: [], previousLocation: null },
  );

  assert.equal(valueOf(snapshot, 'tesla_vehicle_charge_energy_added_joules'), 0);
  assert.equal(valueOf(snapshot, 'tesla_vehicle_charger_power_watts'), 0);
  assert.equal(snapshot.activity.charging, false);
});

test('missing readings are left out instead of reported as zero', () => {
  const snapshot = mapTelemetryToSnapshot(
    telemetry(1000, { charge: null, drive: null, odometerMiles: null, insideTempC: null }),
    { geofences: [], previousLocation: 'Work' },
  );

  assert.deepEqual(
    snapshot.samples.map((sample) => sample.name),
    ['tesla_vehicle_outside_temperature_celsius', 'tesla_vehicle_location'],
  );
  assert.equal(snapshot.location, 'Work');
});

test('resolves the first geofence containing the vehicle', () => {
  const near = telemetry(0, {
    drive: { latitude: 52.3782, longitude: 4.8972, speedMph: null, shiftState: null, powerKw: null },
  });
  const far = telemetry(0, {
    drive: { latitude: 52.0907, longitude: 5.1214, speedMph: null, shiftState: null, powerKw: null },
  });

  assert.equal(resolveLocation(near, [home], null), 'Home');
  assert.equal(resolveLocation(far, [home], 'Home'), LOCATION_OTHER);
  assert.equal(resolveLocation(telemetry(0, { drive: null }), [home], 'Home'), 'Home');
  assert.equal(resolveLocation(telemetry(0, { drive: null }), [home], null), LOCATION_OTHER);

  const snapshot = mapTelemetryToSnapshot(near, { geofences: [home], previousLocation: null });
  assert.deepEqual(
    snapshot.samples.find((sample) => sample.name === 'tesla_vehicle_location')?.labels,
    { location: 'Home' },
  );
});
