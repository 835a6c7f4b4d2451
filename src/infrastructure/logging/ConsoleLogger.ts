/**
 * Console logger implementation
 */

import { ILogger } from '../../domain/interfaces';
import { isLevelEnabled, LoggerOptions, LogLevel } from './levels';

export class ConsoleLogger implements ILogger {
  private level: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  log(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'info')) console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'warn')) console.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'info')) console.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'debug')) console.debug(`[DEBUG] ${message}`, ...args);
  }
}
