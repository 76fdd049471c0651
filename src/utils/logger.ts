import { pino, type Logger } from 'pino';
import { getConfig, type SortedMapConfig } from './config.js';

/**
 * Creates a pino logger configured the same way as a service bootstrap would:
 * pretty output in development, plain JSON lines everywhere else
 */
export function createLogger(name = 'redblack-map', config: SortedMapConfig = getConfig()): Logger {
  return pino({
    name,
    level: config.logLevel,
    transport: config.prettyLogs ? { target: 'pino-pretty' } : undefined
  });
}

export type { Logger };
