import { config as loadEnv } from 'dotenv';
import { ZodError } from 'zod';
import { buildApp } from './app.js';
import { createSigningKey } from './auth/signingKey.js';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger, createLoggerOptions } from './logger.js';
import { logAuthStartupDetails } from './middleware/auth.js';

loadEnv();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    const logger = createLogger({ nodeEnv: process.env.NODE_ENV ?? 'development', logLevel: 'info' });
    if (error instanceof ZodError) {
      logger.fatal({ issues: error.issues.map((issue) => issue.message) }, 'Invalid configuration');
    } else {
      logger.fatal({ err: error }, 'Failed to load configuration');
    }
    process.exit(1);
  }
}

async function bootstrap() {
  const config = readConfig();

  const key = await createSigningKey({
    algorithm: config.auth.algorithm,
    secret: config.auth.secret,
    publicKey: config.auth.publicKey,
  });

  const app = await buildApp({
    key,
    policy: Object.freeze({
      clockToleranceSec: config.auth.clockSkewMs / 1000,
      issuer: config.auth.issuer,
      audiences: config.auth.audiences,
      authoritiesPaths: config.auth.authoritiesPaths,
    }),
    maxTokenLength: config.auth.maxTokenLength,
    logger: createLoggerOptions(config),
    corsOrigins: config.corsOrigins,
  });

  logAuthStartupDetails(app.log, {
    algorithm: config.auth.algorithm,
    issuer: config.auth.issuer,
    audiences: config.auth.audiences,
    authoritiesPaths: config.auth.authoritiesPaths,
    clockSkewMs: config.auth.clockSkewMs,
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  const logger = createLogger({ nodeEnv: process.env.NODE_ENV ?? 'development', logLevel: 'info' });
  logger.fatal({ err: error }, 'Startup failed');
  process.exit(1);
});
