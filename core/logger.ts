/**
 * Leveled console logger shared by the core modules.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[multicaret]';

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled('debug')) console.debug(PREFIX, message, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.info(PREFIX, message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.warn(PREFIX, message, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled('error')) console.error(PREFIX, message, ...details);
  },
};
