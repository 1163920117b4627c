import pino from 'pino';

/** Errors go under the `error` key; pass the Error itself so its class and stack survive. */
export const createLogger = (destination?: pino.DestinationStream): pino.Logger => {
  const options: pino.LoggerOptions = {
    name: 'tesla-exporter',
    level: process.env.LOG_LEVEL || 'info',
    serializers: {
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: ['accessToken', 'refreshToken', '*.accessToken', '*.refreshToken'],
      censor: '[redacted]',
    },
  };

  return destination ? pino(options, destination) : pino(options);
};

export const logger = createLogger();
