import dotenvFlow from 'dotenv-flow';
import type { Server } from 'http';

import { createApp } from './app';
import { getAppConfig } from './config/appConfig';
import { getExporterConfig } from './config/exporterConfig';
import { createRuntime, type ExporterRuntime } from './runtime';
import { logger } from './utils/logger';

dotenvFlow.config();

let server: Server | undefined;
let runtime: ExporterRuntime | undefined;

const start = async (): Promise<void> => {
  const appConfig = getAppConfig();
  const exporterConfig = getExporterConfig();
  runtime = createRuntime(exporterConfig);

  const app = createApp(runtime, appConfig);
  server = app.listen(appConfig.port, () => {
    logger.info(
      { port: appConfig.port, metricsPath: appConfig.metricsPath, mode: exporterConfig.mode },
      'server listening',
    );
  });

  await runtime.scheduler.start();
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, 'shutdown signal received');

  if (runtime) {
    const drained = await runtime.scheduler.stop();
    logger.info({ drained }, 'polling stopped');
  }

  await new Promise<void>((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }

    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  logger.info('shutdown complete');
  process.exit(0);
};

start().catch(async (error) => {
  logger.error({ error }, 'failed to start server');
  await runtime?.scheduler.stop(0).catch((stopError) => {
    logger.error({ error: stopError }, 'error stopping scheduler during startup failure');
  });
  process.exit(1);
});

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error({ error }, 'error during shutdown');
      process.exit(1);
    });
  });
});
