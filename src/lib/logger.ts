/**
 * Console Logger
 * Scoped, levelled logging on top of console
 *
 * Warnings and errors go to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

interface LoggingSettings {
  level: LogLevel;
  disabled: boolean;
}

const settings: LoggingSettings = {
  level: 'info',
  disabled: process.env.DISABLE_LOG === 'true',
};

/**
 * Apply process-wide logging settings (called once from config)
 */
export function configureLogging(update: Partial<LoggingSettings>): void {
  Object.assign(settings, update);
}

function enabled(level: LogLevel): boolean {
  return !settings.disabled && LEVEL_ORDER[level] >= LEVEL_ORDER[settings.level];
}

/**
 * Create a logger whose lines are prefixed with `[scope]`
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...meta) {
      if (enabled('debug')) console.debug(prefix, message, ...meta);
    },
    info(message, ...meta) {
      if (enabled('info')) console.info(prefix, message, ...meta);
    },
    warn(message, ...meta) {
      if (enabled('warn')) console.warn(prefix, message, ...meta);
    },
    error(message, ...meta) {
      if (enabled('error')) console.error(prefix, message, ...meta);
    },
  };
}

/**
 * Error message for logs and in-band error results
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
