export const TIME_UNITS = [
  'nanoseconds',
  'microseconds',
  'milliseconds',
  'seconds',
  'minutes',
  'hours',
  'days',
] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  logLevel: LogLevel;
  /** Pretty-print log lines through pino-pretty instead of emitting JSON. */
  prettyLogs: boolean;
  timers: {
    /** Let pending deadline timers not keep the process alive. */
    unref: boolean;
  };
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** Resumes the suspended caller of a deadline-bounded call with its final outcome. */
export interface Continuation<R> {
  resume(value: R): void;
  resumeWithError(error: unknown): void;
}
