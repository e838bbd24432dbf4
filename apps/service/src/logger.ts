import { pino, type DestinationStream, type Logger } from 'pino';

import type { LogLevel } from './config.js';

export type { Logger };

export interface CreateLoggerOptions {
  readonly level?: LogLevel;
  readonly destination?: DestinationStream;
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  return pino(
    {
      name: 'ngo-contacts',
      level: options.level ?? 'info'
    },
    options.destination
  );
};
