import { buildApp } from './app.js';
import { parseConfig, type AppConfig } from './config.js';
import logger from './logger.js';
import { ConfigError } from './utils/errors.js';

async function bootstrap() {
  let config: AppConfig;
  try {
    config = parseConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration; refusing to start');
      process.exit(1);
    }
    throw error;
  }

  const app = await buildApp(config);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Failed to close cleanly');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { service: config.serviceName, port: config.port, issuer: config.auth.issuer, audience: config.auth.audience },
      'token-relay service listening',
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Bootstrap failed');
  process.exit(1);
});
