const parseInteger = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return parsed;
};

const normalizePath = (value: string | undefined, fallback: string): string => {
  const candidate = value?.trim() || fallback;
  return candidate.startsWith('/') ? candidate : `/${candidate}`;
};

export const getAppConfig = (env: NodeJS.ProcessEnv = process.env) => ({
  env: env.NODE_ENV || 'development',
  port: parseInteger(env.PORT, 9100),
  metricsPath: normalizePath(env.METRICS_PATH, '/metrics'),
  apiKey: env.API_KEY || null,
  rateLimit: {
    windowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS, 60_000),
    max: parseInteger(env.RATE_LIMIT_MAX, 120),
  },
  requestIdHeader: (env.REQUEST_ID_HEADER || 'x-request-id').toLowerCase(),
  logging: {
    redactHeaders: ['authorization', 'cookie', 'x-api-key'],
  },
  helmet: {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  },
});

export type AppConfig = ReturnType<typeof getAppConfig>;
