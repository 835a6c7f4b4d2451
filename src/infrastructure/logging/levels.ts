/**
 * Log level threshold shared by the logger implementations
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Lowest level written; `log` counts as `info`. Defaults to `info`. */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function levelFromDebugFlag(debugMode: boolean): LogLevel {
  return debugMode ? 'debug' : 'info';
}
