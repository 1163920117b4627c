import dotenvFlow from 'dotenv-flow';

import { exporterConfigSchema } from '../src/config/exporterConfig';
import { nextDelayMs } from '../src/rules/pollPolicy';
import { createRuntime } from '../src/runtime';
import { SimulatedVehicleApi } from '../src/simulation/tesla.mock';

dotenvFlow.config();

const WAKE_POLICIES = ['never-wake', 'wake-on-schedule'] as const;

type WakePolicy = (typeof WAKE_POLICIES)[number];

const isWakePolicy = (value: string): value is WakePolicy =>
  WAKE_POLICIES.some((policy) => policy === value);

const parseArgs = () => {
  const args = process.argv.slice(2);
  return args.reduce<{ hours?: number; wakePolicy?: string }>((accumulator, arg) => {
    if (arg.startsWith('--hours=')) {
      return { ...accumulator, hours: Number(arg.split('=')[1]) };
    }

    if (arg.startsWith('--wake-policy=')) {
      return { ...accumulator, wakePolicy: arg.split('=')[1] };
    }

    return accumulator;
  }, {});
};

/**
 * Replays the simulated fleet on a virtual clock and prints the final exposition, along
 * with how many upstream calls each endpoint received.
 */
const run = async () => {
  const { hours = 6, wakePolicy = 'never-wake' } = parseArgs();
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new Error('--hours must be a positive number');
  }
  if (!isWakePolicy(wakePolicy)) {
    throw new Error(`Unknown wake policy "${wakePolicy}". Available: ${WAKE_POLICIES.join(', ')}`);
  }

  let clock = Date.now();
  const now = () => clock;
  const config = exporterConfigSchema.parse({ mode: 'simulated', wake: { policy: wakePolicy } });
  const api = new SimulatedVehicleApi({ now });
  const runtime = createRuntime(config, { api, now });

  const token = await runtime.credentials.getValidToken();
  const vehicles = await api.listVehicles(token);
  if (vehicles.length === 0) {
    throw new Error('The simulated account has no vehicles');
  }
  const dueAt = new Map<string, number>();
  vehicles.forEach((vehicle) => {
    runtime.registry.register(vehicle);
    runtime.cache.register(vehicle.id);
    dueAt.set(vehicle.id, clock);
  });

  const endAt = clock + hours * 3_600_000;
  while (clock < endAt) {
    const [deviceId, at] = [...dueAt.entries()].reduce((earliest, entry) =>
      entry[1] < earliest[1] ? entry : earliest,
    );
    clock = at;

    const result = await runtime.poller.poll(deviceId);
    if (result.outcome === 'halted') {
      throw result.error;
    }

    dueAt.set(
      deviceId,
      result.outcome === 'deferred'
        ? result.retryAt
        : clock + nextDelayMs(result.device, clock, config),
    );
  }

  // eslint-disable-next-line no-console
  console.log(runtime.exporter.render());
  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      { simulatedHours: hours, wakePolicy, polls: runtime.poller.pollCounts() },
      null,
      2,
    ),
  );
};

run().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
