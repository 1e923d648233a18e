import pino, { type LoggerOptions } from 'pino';

export function buildLoggerOptions(settings: { nodeEnv: string; logLevel: string; serviceName: string }): LoggerOptions {
  const isProd = settings.nodeEnv === 'production';
  return {
    level: settings.nodeEnv === 'test' ? 'silent' : settings.logLevel,
    base: { service: settings.serviceName },
    redact: ['req.headers.authorization', 'headers.authorization'],
    transport:
      isProd || settings.nodeEnv === 'test'
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              singleLine: true,
            },
          },
  };
}

/** Logger for code that runs before the app (and its request logger) exists. */
export const logger = pino(
  buildLoggerOptions({
    nodeEnv: process.env.NODE_ENV ?? 'development',
    logLevel: process.env.LOG_LEVEL ?? 'info',
    serviceName: process.env.SERVICE_NAME ?? 'token-relay',
  }),
);

export default logger;
