/**
 * Logging for ragtalk
 */

/**
 * Logger used by the pipeline and the CLI.
 * Any logging library can be plugged in behind it.
 */
export interface Logger {
  debug: (message: string, context?: object) => void;
  info: (message: string, context?: object) => void;
  warn: (message: string, context?: object) => void;
  error: (message: string, context?: object) => void;
}

/** Logger that discards everything. The library default. */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

/**
 * Writes to the console, dropping messages below `level`.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private scope?: string;

  constructor(options: { level?: LogLevel; scope?: string } = {}) {
    this.minLevel = options.level ?? 'info';
    this.scope = options.scope;
  }

  /** A logger with the same level that prefixes messages with `scope` */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.minLevel,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private log(level: LogMethod, message: string, context?: object): void {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const prefix = this.scope
      ? `[${level.toUpperCase()}] [${this.scope}]`
      : `[${level.toUpperCase()}]`;
    const fullMessage = `${prefix} ${message}`;

    if (context && Object.keys(context).length > 0) {
      console[level](fullMessage, context);
    } else {
      console[level](fullMessage);
    }
  }

  debug(message: string, context?: object): void { this.log('debug', message, context); }
  info(message: string, context?: object): void { this.log('info', message, context); }
  warn(message: string, context?: object): void { this.log('warn', message, context); }
  error(message: string, context?: object): void { this.log('error', message, context); }
}
