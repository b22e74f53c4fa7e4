export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

import fs from 'fs';
import path from 'path';
import { types } from 'util';

export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

export class Logger {
  private static logLevel: LogLevel = LogLevel.INFO;
  private static logEnabled: boolean = true;
  private static logFile: string = path.join(process.cwd(), 'delimited-writer.log');

  static setLogLevel(level: LogLevel) {
    Logger.logLevel = level;
  }

  static enableLogs(enabled: boolean) {
    Logger.logEnabled = enabled;
  }

  static setLogFile(file: string) {
    Logger.logFile = file;
  }

  static getLogFile(): string {
    return Logger.logFile;
  }

  private static shouldLog(level: LogLevel): boolean {
    if (!Logger.logEnabled) return false;

    const levels = Object.values(LogLevel);
    const currentLevelIndex = levels.indexOf(Logger.logLevel);
    const messageLevelIndex = levels.indexOf(level);

    return messageLevelIndex >= currentLevelIndex;
  }

  private static formatMessage(level: LogLevel, context: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] ${level.padEnd(5)} [${context}] ${message}`;
  }

  private static writeToFile(message: string) {
    fs.appendFileSync(this.logFile, message + '\n');
  }

  private static log(level: LogLevel, context: string, message: string, data?: unknown) {
    if (!this.shouldLog(level)) return;

    const logMessage = this.formatMessage(level, context, message);
    if (data !== undefined) {
      this.writeToFile(`${logMessage}\n${JSON.stringify(data, null, 2)}`);
    } else {
      this.writeToFile(logMessage);
    }
  }

  static debug(context: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, context, message, data);
  }

  static info(context: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, context, message, data);
  }

  static warn(context: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, context, message, data);
  }

  static error(context: string, message: string, error?: unknown) {
    if (this.shouldLog(LogLevel.ERROR)) {
      const logMessage = this.formatMessage(LogLevel.ERROR, context, message);
      this.writeToFile(logMessage);
      if (error) {
        if (types.isNativeError(error)) {
          this.writeToFile(error.stack || error.message);
        } else {
          this.writeToFile(JSON.stringify(error, null, 2));
        }
      }
    }
  }
}
