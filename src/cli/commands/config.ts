// Configuration management command

import chalk from 'chalk';
import { ConfigError, getConfigValue, loadConfig, setConfigValue } from '../../utils/config.js';
import { getConfigFilePath } from '../../utils/app-paths.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface ConfigCommandOptions {
  set?: string;
  get?: string;
  list?: boolean;
}

export interface ConfigCommandDeps {
  file?: string;
  logger?: Logger;
}

/**
 * Runs `config --set/--get/--list`. Returns false when the request failed.
 */
export async function runConfig(options: ConfigCommandOptions, deps: ConfigCommandDeps = {}): Promise<boolean> {
  const file = deps.file ?? getConfigFilePath();
  const out = deps.logger ?? defaultLogger;

  try {
    if (options.list) {
      const config = await loadConfig(file);
      out.info(chalk.bold('Configuration:') + ' ' + chalk.gray(file));
      out.info(JSON.stringify(config, null, 2));
      return true;
    }

    if (options.get) {
      const value = await getConfigValue(options.get, file);
      if (value === undefined) {
        out.warn(`Key not found: ${options.get}`);
        return false;
      }
      out.info(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
      return true;
    }

    if (options.set) {
      const eqIndex = options.set.indexOf('=');
      if (eqIndex <= 0) {
        out.error('Invalid format. Use: --set key=value');
        return false;
      }

      const key = options.set.slice(0, eqIndex);
      const value = options.set.slice(eqIndex + 1);
      await setConfigValue(key, value, file);
      out.success(`✓ Set ${key} = ${value}`);
      return true;
    }

    out.warn('Use --set, --get, or --list');
    out.info(chalk.gray('Examples:'));
    out.info(chalk.gray('  forgeloop config --list'));
    out.info(chalk.gray('  forgeloop config --get github.owner'));
    out.info(chalk.gray('  forgeloop config --set github.owner=my-org'));
    return false;
  } catch (error) {
    if (error instanceof ConfigError) {
      out.error(`Error: ${error.message}`);
      return false;
    }
    throw error;
  }
}

export async function configCommand(options: ConfigCommandOptions): Promise<void> {
  if (!(await runConfig(options))) {
    process.exitCode = 1;
  }
}
