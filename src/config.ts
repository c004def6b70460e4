import { z } from 'zod';
import { LOG_LEVELS } from './types.js';
import type { AppConfig } from './types.js';
import { loadEnvironment } from './utils/env.js';

const lowerCase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const booleanFlag = z.preprocess(
  lowerCase,
  z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1')
);

// Package-prefixed: a host application's LOG_LEVEL or NODE_ENV is never read.
const envSchema = z.object({
  DEADLINE_LOG_LEVEL: z.preprocess(lowerCase, z.enum(LOG_LEVELS).default('info')),
  DEADLINE_PRETTY_LOGS: booleanFlag,
  DEADLINE_UNREF_TIMERS: booleanFlag,
});

let cachedConfig: AppConfig | null = null;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Read this .env file into process.env before parsing. */
  envPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  if (options.envPath) {
    loadEnvironment(options.envPath);
  }
  const parsed = envSchema.parse(options.env ?? process.env);
  const typed: AppConfig = {
    logLevel: parsed.DEADLINE_LOG_LEVEL,
    prettyLogs: parsed.DEADLINE_PRETTY_LOGS,
    timers: { unref: parsed.DEADLINE_UNREF_TIMERS },
  };
  cachedConfig = typed;
  return typed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
