/**
 * Debug utilities
 * Leveled console logging, threshold taken from LOG_LEVEL
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function debug(message: string, data?: unknown): void {
  if (enabled('debug')) {
    console.log(`[DEBUG] ${message}`, data ?? '');
  }
}

export function info(message: string, data?: unknown): void {
  if (enabled('info')) {
    console.log(`[INFO] ${message}`, data ?? '');
  }
}

export function warn(message: string, data?: unknown): void {
  if (enabled('warn')) {
    console.warn(`[WARN] ${message}`, data ?? '');
  }
}

export function error(message: string, err?: unknown): void {
  if (enabled('error')) {
    console.error(`[ERROR] ${message}`, err ?? '');
  }
}
