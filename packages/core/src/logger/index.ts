/**
 * scratchpay logger
 * Levelled console logging, written to stderr so it never mixes with command output.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  trace(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const PREFIX = '[scratchpay]';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

let currentLevel: LogLevel = 'warn';

// Initial level from env
const envLevel = process.env.SCRATCHPAY_LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
  currentLevel = envLevel;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

class ConsoleLogger implements Logger {
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
  }

  private format(message: string): string {
    return `${PREFIX} ${message}`;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.error(this.format(message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.error(this.format(message), ...args);
    }
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      console.error(this.format(message), ...args);
    }
  }
}

const loggerInstance = new ConsoleLogger();

export function getLogger(): Logger {
  return loggerInstance;
}
