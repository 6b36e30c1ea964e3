import type { LogLevel } from './config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

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
  debug(message: string): void {
    if (enabled('debug')) console.log(`[debug] ${message}`);
  },
  info(message: string): void {
    if (enabled('info')) console.log(message);
  },
  warn(message: string): void {
    if (enabled('warn')) console.warn(message);
  },
  error(message: string, error?: unknown): void {
    if (!enabled('error')) return;
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};
