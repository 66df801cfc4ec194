/* eslint-disable no-console */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

interface LoggerState {
  level: LogLevel;
}

export class Logger {
  constructor(
    private readonly state: LoggerState,
    private readonly scope?: string
  ) {}

  /**
   * Create a logger that prefixes every line with `[scope]`.
   * Children share the level of the logger they came from.
   */
  child(scope: string): Logger {
    return new Logger(this.state, scope);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format('ERROR', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format('WARN', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(this.format('INFO', message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format('DEBUG', message), ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.state.level);
  }

  private format(label: string, message: string): string {
    const scope = this.scope ? `[${this.scope}] ` : '';
    return `[${label}] ${new Date().toISOString()} - ${scope}${message}`;
  }
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();

export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
