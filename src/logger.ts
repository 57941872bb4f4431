import pino, { type LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';

export function createLoggerOptions(config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): LoggerOptions {
  const isProd = config.nodeEnv === 'production';

  return {
    level: config.logLevel,
    redact: ['req.headers.authorization'],
    transport: isProd
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

export function createLogger(config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>) {
  return pino(createLoggerOptions(config));
}
