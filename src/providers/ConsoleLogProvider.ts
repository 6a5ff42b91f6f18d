/**
 * Console-based log provider.
 * Keeps every accepted event in memory for inspection (tests read `events`)
 * and optionally echoes them to stderr, leaving stdout to the CLI.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Echo events to stderr as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are discarded. Default: 'debug'. */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Accepted events, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      process.stderr.write(
        `${stamped.timestamp} [${stamped.level.toUpperCase()}] ${stamped.message}${fieldsStr}\n`
      );
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  clear(): void {
    this.events.length = 0;
  }
}
