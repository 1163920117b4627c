import { randomUUID } from 'crypto';
import express, { Application } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';

import { createApiKeyMiddleware } from './middleware/apiKey.middleware';
import { errorHandler } from './middleware/errorHandler.middleware';
import { createMetricsRouter } from './controllers/metrics.controller';
import { createVehiclesRouter } from './controllers/vehicles.controller';
import { getAppConfig, type AppConfig } from './config/appConfig';
import type { ExporterRuntime } from './runtime';
import { serviceUnavailableError } from './utils/errors';
import { logger } from './utils/logger';

export type AppRuntime = Pick<
  ExporterRuntime,
  'exporter' | 'scheduler' | 'credentials' | 'registry' | 'cache'
>;

export const createApp = (
  runtime: AppRuntime,
  appConfig: AppConfig = getAppConfig(),
): Application => {
  const app = express();

  const redactPaths = appConfig.logging.redactHeaders.map((header) => {
    const sanitized = header.toLowerCase();
    return /^[a-z0-9_]+$/.test(sanitized)
      ? `req.headers.${sanitized}`
      : `req.headers["${sanitized}"]`;
  });

  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const incomingHeader = req.headers[appConfig.requestIdHeader];
        const candidate = Array.isArray(incomingHeader)
          ? incomingHeader[0]
          : incomingHeader;
        const requestId = candidate && candidate.length > 0 ? candidate : randomUUID();
        res.setHeader(appConfig.requestIdHeader, requestId);
        return requestId;
      },
      redact: {
        paths: redactPaths,
        remove: true,
      },
      serializers: {
        req(req) {
          const { id, method, url } = req;
          return { id, method, url };
        },
        res(res) {
          const { statusCode } = res;
          return { statusCode };
        },
      },
    }),
  );

  app.use(
    helmet({
      contentSecurityPolicy: appConfig.helmet.contentSecurityPolicy,
      crossOriginEmbedderPolicy: false,
    }),
  );
  app.use(
    rateLimit({
      windowMs: appConfig.rateLimit.windowMs,
      limit: appConfig.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        const retryAfterSeconds = Math.ceil(appConfig.rateLimit.windowMs / 1000);
        res.setHeader('Retry-After', retryAfterSeconds.toString());
        res.status(429).json({
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests. Slow down before retrying.',
            details: {
              windowMs: appConfig.rateLimit.windowMs,
              maxRequests: appConfig.rateLimit.max,
              retryAfterSeconds,
              requestId: req.id,
            },
            requestId: req.id,
          },
        });
      },
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/ready', (req, res, next) => {
    const scheduler = runtime.scheduler.status();
    const credentials = runtime.credentials.status();

    if (scheduler.halted || credentials.terminal) {
      next(
        serviceUnavailableError('Polling is halted: the refresh token was rejected.', {
          reason: scheduler.haltReason ?? credentials.lastError,
        }),
      );
      return;
    }

    res.json({
      status: 'ready',
      details: {
        running: scheduler.running,
        devices: runtime.registry.list().length,
        inflightCycles: scheduler.inflight,
        tokenExpiresAt:
          credentials.expiresAt === null ? null : new Date(credentials.expiresAt).toISOString(),
      },
      requestId: req.id,
    });
  });

  app.use(createMetricsRouter(runtime.exporter, appConfig.metricsPath));

  app.use(
    '/api/v1/vehicles',
    createApiKeyMiddleware(appConfig.apiKey),
    createVehiclesRouter({ registry: runtime.registry, cache: runtime.cache }),
  );

  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
        requestId: req.id,
      },
    });
  });

  app.use(errorHandler);

  return app;
};
