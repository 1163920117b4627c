import fs from 'fs';
import { z } from 'zod';

const durationMs = z.coerce.number().int().min(0);
const positiveInt = z.coerce.number().int().positive();

const geofenceSchema = z.object({
  location: z.string().min(1, 'geofence location is required'),
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  radiusMeters: z.coerce.number().positive(),
});

const bucketSchema = (defaults: {
  capacity: number;
  refillPerMinute: number;
  minIntervalMs: number;
}) =>
  z
    .object({
      capacity: positiveInt.default(defaults.capacity),
      refillPerMinute: z.coerce.number().positive().default(defaults.refillPerMinute),
      minIntervalMs: durationMs.default(defaults.minIntervalMs),
    })
    .default({});

export const exporterConfigSchema = z
  .object({
    mode: z.enum(['live', 'simulated']).default('live'),
    refreshToken: z.string().min(1).nullable().default(null),
    vehicleIds: z.array(z.string().min(1)).default([]),
    geofences: z.array(geofenceSchema).default([]),
    poll: z
      .object({
        onlineIntervalMs: positiveInt.default(60_000),
        asleepIntervalMs: positiveInt.default(60_000),
        wakingIntervalMs: positiveInt.default(15_000),
        presenceCheckEveryCycles: positiveInt.default(15),
        failureThreshold: positiveInt.default(3),
        unreachableBaseMs: positiveInt.default(60_000),
        unreachableMaxMs: positiveInt.default(1_800_000),
        idleSuspendAfterMs: durationMs.default(600_000),
        suspendDurationMs: durationMs.default(1_260_000),
        discoveryIntervalMs: positiveInt.default(3_600_000),
        requestTimeoutMs: positiveInt.default(30_000),
      })
      .default({}),
    wake: z
      .object({
        policy: z.enum(['never-wake', 'wake-on-schedule']).default('never-wake'),
        intervalMs: positiveInt.default(21_600_000),
      })
      .default({}),
    cache: z
      .object({
        staleAfterMs: positiveInt.default(300_000),
        staleMode: z.enum(['flag', 'omit']).default('flag'),
      })
      .default({}),
    credentials: z
      .object({
        safetyMarginMs: durationMs.default(30_000),
      })
      .default({}),
    rateLimits: z
      .object({
        telemetry: bucketSchema({ capacity: 30, refillPerMinute: 6, minIntervalMs: 0 }),
        wake: bucketSchema({ capacity: 2, refillPerMinute: 0.2, minIntervalMs: 60_000 }),
      })
      .default({}),
    shutdownGraceMs: durationMs.default(10_000),
  })
  .superRefine((config, ctx) => {
    if (config.mode === 'live' && !config.refreshToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['refreshToken'],
        message: 'TESLA_REFRESH_TOKEN is required when TESLA_MODE is live',
      });
    }

    if (config.poll.unreachableMaxMs < config.poll.unreachableBaseMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['poll', 'unreachableMaxMs'],
        message: 'unreachableMaxMs must not be lower than unreachableBaseMs',
      });
    }
  });

export type ExporterConfig = z.infer<typeof exporterConfigSchema>;
export type Geofence = z.infer<typeof geofenceSchema>;
export type PollConfig = ExporterConfig['poll'];
export type EndpointBudget = ExporterConfig['rateLimits']['telemetry'];
export type StaleMode = ExporterConfig['cache']['staleMode'];

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Deep merge where `undefined` in the overlay keeps the base value. */
const mergeDefined = (base: PlainObject, overlay: PlainObject): PlainObject =>
  Object.entries(overlay).reduce<PlainObject>(
    (accumulator, [key, value]) => {
      if (value === undefined) {
        return accumulator;
      }

      const current = accumulator[key];
      if (isPlainObject(current) && isPlainObject(value)) {
        return { ...accumulator, [key]: mergeDefined(current, value) };
      }

      return { ...accumulator, [key]: value };
    },
    { ...base },
  );

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) {
    return undefined;
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const readConfigFile = (configPath: string | undefined): PlainObject => {
  if (!configPath) {
    return {};
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!isPlainObject(parsed)) {
    throw new Error(`Exporter configuration file ${configPath} must contain a JSON object.`);
  }

  return parsed;
};

const fromEnvironment = (env: NodeJS.ProcessEnv): PlainObject => ({
  mode: env.TESLA_MODE?.toLowerCase(),
  refreshToken: env.TESLA_REFRESH_TOKEN,
  vehicleIds: parseList(env.TESLA_VEHICLE_IDS),
  poll: {
    onlineIntervalMs: env.POLL_ONLINE_INTERVAL_MS,
    asleepIntervalMs: env.POLL_ASLEEP_INTERVAL_MS,
    wakingIntervalMs: env.POLL_WAKING_INTERVAL_MS,
    presenceCheckEveryCycles: env.PRESENCE_CHECK_EVERY_CYCLES,
    failureThreshold: env.FAILURE_THRESHOLD,
    unreachableBaseMs: env.UNREACHABLE_BASE_MS,
    unreachableMaxMs: env.UNREACHABLE_MAX_MS,
    idleSuspendAfterMs: env.IDLE_SUSPEND_AFTER_MS,
    suspendDurationMs: env.SUSPEND_DURATION_MS,
    discoveryIntervalMs: env.DISCOVERY_INTERVAL_MS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  },
  wake: {
    policy: env.WAKE_POLICY,
    intervalMs: env.WAKE_INTERVAL_MS,
  },
  cache: {
    staleAfterMs: env.STALE_AFTER_MS,
    staleMode: env.STALE_MODE,
  },
  credentials: {
    safetyMarginMs: env.TOKEN_SAFETY_MARGIN_MS,
  },
  rateLimits: {
    telemetry: {
      capacity: env.RATE_TELEMETRY_CAPACITY,
      refillPerMinute: env.RATE_TELEMETRY_REFILL_PER_MINUTE,
      minIntervalMs: env.RATE_TELEMETRY_MIN_INTERVAL_MS,
    },
    wake: {
      capacity: env.RATE_WAKE_CAPACITY,
      refillPerMinute: env.RATE_WAKE_REFILL_PER_MINUTE,
      minIntervalMs: env.RATE_WAKE_MIN_INTERVAL_MS,
    },
  },
  shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
});

/**
 * Builds the exporter configuration from an optional JSON file (`EXPORTER_CONFIG_PATH`)
 * overlaid with environment variables. Throws a `ZodError` when the result is invalid.
 */
export const getExporterConfig = (env: NodeJS.ProcessEnv = process.env): ExporterConfig => {
  const populated: NodeJS.ProcessEnv = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0),
  );
  const fileConfig = readConfigFile(populated.EXPORTER_CONFIG_PATH);
  const merged = mergeDefined(fileConfig, fromEnvironment(populated));
  return exporterConfigSchema.parse(merged);
};
