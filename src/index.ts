#!/usr/bin/env node

// ForgeLoop CLI - Entry Point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { getErrorHint, handleError, isDebugEnabled } from './utils/error-handler.js';
import { log } from './utils/logger.js';

async function main(): Promise<void> {
  const program = createCLI();
  program.exitOverride();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors have already been printed
      process.exitCode = error.exitCode;
      return;
    }

    handleError(error, {
      context: 'main',
      includeStack: isDebugEnabled() || process.argv.includes('--debug'),
    });
    const hint = getErrorHint(error);
    if (hint) log.warn(hint);
    process.exitCode = 1;
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', (reason) => {
  handleError(reason, {
    context: 'unhandledRejection',
    includeStack: isDebugEnabled(),
  });
  process.exitCode = 1;
});

// Handle uncaught exceptions globally
process.on('uncaughtException', (error) => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true, // Always show stack for uncaught exceptions
    exitProcess: true,
    exitCode: 1,
  });
});

void main();
