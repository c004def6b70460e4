import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';

let instance: Logger | null = null;

/** Built on first use, so importing the package never reads the environment. */
export function getLogger(): Logger {
  if (!instance) {
    const config = loadConfig();
    instance = pino({
      name: 'deadline-scope',
      level: config.logLevel,
      transport: config.prettyLogs
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
    });
  }
  return instance;
}
