/**
 * Logging provider interface.
 * Services log through this so the sink (stderr, test buffer) stays swappable.
 */

/** Log severity levels, lowest first. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  fields?: Record<string, unknown>;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Flush any buffered events. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
