import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

import { config, type Config } from '../config/index.js';

// Connection strings and bot tokens travel inside logged config objects
export const REDACTED_PATHS = ['*.databaseUrl', '*.botToken', 'req.headers.authorization'];

export function createLogger(
  settings: Pick<Config, 'env' | 'logLevel'>,
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    name: 'flakelens-api',
    level: settings.logLevel,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    transport:
      settings.env === 'development' && !destination
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'HH:MM:ss Z',
            },
          }
        : undefined,
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger: Logger = createLogger(config);
