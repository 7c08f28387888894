/**
 * Console loggers for server modules.
 *
 * `createLogger(scope)` gives a module its own prefixed, level-filtered
 * logger; `log(message, source)` is the timestamped line used for server
 * lifecycle output.
 */

export const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

let currentLogLevel: number = LOG_LEVELS[readEnvLogLevel()];

function readEnvLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL ?? 'info';
  return isLogLevel(level) ? level : 'info';
}

/** Change the threshold for every logger created by this module. */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = LOG_LEVELS[level];
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.debug) {
        console.log(`[${scope}:debug] ${message}`);
      }
    },
    info: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.info) {
        console.log(`[${scope}] ${message}`);
      }
    },
    warn: (message: string) => {
      if (currentLogLevel <= LOG_LEVELS.warn) {
        console.warn(`[${scope}:warn] ${message}`);
      }
    },
    error: (message: string, error?: unknown) => {
      // Errors always log regardless of level
      console.error(`[${scope}:error] ${message}`, error ?? '');
    },
  };
}

export function log(message: string, source = 'express'): void {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}
