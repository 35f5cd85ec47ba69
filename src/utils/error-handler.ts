/**
 * Centralized error handler with stack trace logging
 * Provides consistent error reporting across CLI commands and the scaffold run
 */

import chalk from 'chalk';
import { logger } from './logger.js';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
  /** Whether to suppress output */
  silent?: boolean;
  /** Destination for the formatted error (default: stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Base class for errors raised by ForgeLoop itself
 */
export class ForgeLoopError extends Error {
  constructor(
    message: string,
    public readonly context?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'ForgeLoopError';
  }
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'development' || !!env.DEBUG;
}

export class ErrorHandler {
  static formatError(error: unknown, options: Pick<ErrorHandlingOptions, 'includeStack' | 'context'>): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    let stackTrace: string | undefined;
    if (error instanceof Error) {
      stackTrace = error.stack;
    }

    output.push(chalk.red(this.getDiagnostic(error) ?? this.getErrorMessage(error)));

    if (options.includeStack && stackTrace) {
      output.push('');
      output.push(chalk.dim('Stack trace:'));
      output.push(chalk.gray(stackTrace));
    }

    output.push('');

    return output.join('\n');
  }

  /**
   * Handle an error with consistent logging and optional stack trace
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const {
      includeStack = isDebugEnabled(),
      context,
      exitProcess = false,
      exitCode = 1,
      silent = false,
      stream = process.stderr,
    } = options;

    if (!silent) {
      stream.write(this.formatError(error, { includeStack, context }) + '\n');

      logger.debug(`[${context || 'ErrorHandler'}] ${error instanceof Error ? error.name : typeof error}`);
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }

  /**
   * Extract error message safely
   */
  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    // Errors created in another realm (vm contexts, test sandboxes) fail instanceof
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return String(error);
  }

  /**
   * Ready-to-print report carried by errors that have one (e.g. a classified
   * remote failure); undefined otherwise
   */
  static getDiagnostic(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'diagnostic' in error && typeof error.diagnostic === 'string') {
      return error.diagnostic || undefined;
    }
    return undefined;
  }

  static hasMessagePattern(error: unknown, pattern: RegExp): boolean {
    return pattern.test(this.getErrorMessage(error));
  }
}

/**
 * Convenience function for quick error handling
 */
export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}

/**
 * Whether a thrown value carries a Node system error code such as ENOENT.
 * Checks the field rather than the prototype chain.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Common error patterns for checking
 */
export const ErrorPatterns = {
  NETWORK: /network|timeout|econnrefused|etimedout|enotfound|fetch failed/i,
  TLS: /certificate|self[- ]signed|unable to verify|ssl|tls/i,
  PERMISSION_DENIED: /eacces|eperm|permission denied/i,
};

export function matchesErrorPattern(error: unknown, pattern: RegExp): boolean {
  return ErrorHandler.hasMessagePattern(error, pattern);
}

/**
 * One-line advice for failures the user can usually fix themselves
 */
export function getErrorHint(error: unknown): string | undefined {
  if (matchesErrorPattern(error, ErrorPatterns.TLS)) {
    return 'Certificates are read from the operating system store. Make sure your proxy or corporate CA is installed there.';
  }
  if (matchesErrorPattern(error, ErrorPatterns.NETWORK)) {
    return 'Check your network connection and proxy settings, then try again.';
  }
  if (matchesErrorPattern(error, ErrorPatterns.PERMISSION_DENIED)) {
    return 'Check that you have write access to the target directory.';
  }
  return undefined;
}
