import type { Logger } from '@transit-console/gtfs-parser';
import type { AppConfig } from './config.js';

/**
 * Leveled logger for the console client.
 * Logs to stderr so it never interleaves with the menus on stdout.
 */
export function createLogger(debugEnabled: () => boolean = () => (process.env.DEBUG ?? '').trim() !== ''): Logger {
  return {
    info: (message: string, ...args: unknown[]) => {
      console.error(`[INFO] ${message}`, ...args);
    },
    warn: (message: string, ...args: unknown[]) => {
      console.error(`[WARN] ${message}`, ...args);
    },
    error: (message: string, ...args: unknown[]) => {
      console.error(`[ERROR] ${message}`, ...args);
    },
    debug: (message: string, ...args: unknown[]) => {
      if (debugEnabled()) {
        console.error(`[DEBUG] ${message}`, ...args);
      }
    },
  };
}

export const logger = createLogger();

/** Logger whose debug output follows the loaded configuration. */
export function loggerFor(config: Pick<AppConfig, 'debug'>): Logger {
  return createLogger(() => config.debug);
}
