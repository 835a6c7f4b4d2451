/**
 * File logger implementation
 * Writes daily log files in the runtime directory
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../../domain/interfaces';
import config from '../../config';
import { isLevelEnabled, LoggerOptions, LogLevel } from './levels';

export class FileLogger implements ILogger {
  private logDir: string;
  private logFile: string;
  private errorFile: string;
  private level: LogLevel;
  private writeStream: fs.WriteStream | null = null;
  private errorStream: fs.WriteStream | null = null;

  constructor(logDir?: string, options: LoggerOptions = {}) {
    this.logDir = logDir || path.join(config.RUNTIME_DIR, 'logs');
    this.level = options.level ?? 'info';

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const day = new Date().toISOString().split('T')[0];
    this.logFile = path.join(this.logDir, `app-${day}.log`);
    this.errorFile = path.join(this.logDir, `error-${day}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
      this.writeStream = null;
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
      this.errorStream = null;
    });
  }

  get files(): { log: string; error: string } {
    return { log: this.logFile, error: this.errorFile };
  }

  private formatMessage(level: string, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(arg =>
      arg instanceof Error ? arg.stack ?? arg.message : typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
    ).join(' ') : '';
    return `[${timestamp}] [${level}] ${message}${argsStr}\n`;
  }

  private writeToFile(stream: fs.WriteStream | null, level: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(this.formatMessage(level, message, args));
  }

  log(message: string, ...args: unknown[]): void {
    this.info(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.writeToFile(this.errorStream, 'ERROR', message, args);
    this.writeToFile(this.writeStream, 'ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'warn')) this.writeToFile(this.writeStream, 'WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'info')) this.writeToFile(this.writeStream, 'INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled(this.level, 'debug')) this.writeToFile(this.writeStream, 'DEBUG', message, args);
  }

  /**
   * Flushes and closes both files
   */
  close(): Promise<void> {
    const streams = [this.writeStream, this.errorStream];
    this.writeStream = null;
    this.errorStream = null;
    return Promise.all(
      streams.map((stream) => new Promise<void>((resolve) => {
        if (!stream || stream.destroyed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      }))
    ).then(() => undefined);
  }
}
