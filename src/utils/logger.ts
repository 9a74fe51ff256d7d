/**
 * Console-backed logger shared by the task model, the pipeline and the CLI.
 *
 * Every logger reads the same root configuration, so `configureLogging` (or
 * `suppress` in tests) applies to loggers created before the call as well.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum level to log (debug < info < warn < error) */
  minLevel: LogLevel;
  enabled: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const rootConfig: LoggerConfig = {
  minLevel: process.env.NODE_ENV === 'production' ? 'warn' : 'info',
  enabled: true,
};

export class Logger {
  constructor(private context: string = '') {}

  private shouldLog(level: LogLevel): boolean {
    if (!rootConfig.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[rootConfig.minLevel];
  }

  private formatMessage(message: string): string {
    return this.context ? `[${this.context}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage(message), ...args);
    }
  }
}

export function configureLogging(config: Partial<LoggerConfig>): void {
  Object.assign(rootConfig, config);
}

/** Silence all loggers (tests). */
export function suppressLogging(): void {
  rootConfig.enabled = false;
}

export function restoreLogging(): void {
  rootConfig.enabled = true;
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
