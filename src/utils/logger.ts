/**
 * Centralized logging utility for diagnostics
 *
 * NOTE: This logger is NOT for the progress tree. The live display owns
 * stdout while a scaffold runs; this logger writes to stderr only.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
  stream: NodeJS.WritableStream;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  useTimestamps: false, // Disabled by default for cleaner output
  useColors: true,
  stream: process.stderr,
};

/**
 * Diagnostic logger that writes to stderr
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Check if a given log level would be printed
   */
  shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private write(message: string, level: LogLevel): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.useTimestamps
      ? chalk.dim(`[${new Date().toISOString()}] `)
      : '';

    this.config.stream.write(timestamp + message + '\n');
  }

  private format(message: string, colorFn: (str: string) => string): string {
    if (this.config.useColors) {
      return colorFn(message);
    }
    return message;
  }

  debug(message: string): void {
    this.write(this.format(message, chalk.gray), LogLevel.DEBUG);
  }

  info(message: string): void {
    this.write(this.format(message, chalk.white), LogLevel.INFO);
  }

  success(message: string): void {
    this.write(this.format(message, chalk.green), LogLevel.INFO);
  }

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }

  newline(): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.config.stream.write('\n');
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Convenience functions for direct import
 */
export const log = {
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  newline: () => logger.newline(),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
