// Initialize a ForgeLoop project from the latest template release

import path from 'path';
import chalk from 'chalk';
import { select } from '@inquirer/prompts';
import {
  DEFAULT_AGENT,
  defaultScriptType,
  isScriptType,
  listAgents,
  SCRIPT_TYPE_KEYS,
  SCRIPT_TYPES,
  type AgentConfig,
  type ScriptType,
} from '../../agents/agent-config.js';
import { RemoteRequestError } from '../../github/errors.js';
import { FetchClient } from '../../github/fetch-client.js';
import { LiveDisplay } from '../../progress/live-display.js';
import { createScaffoldTracker, runScaffold, ScaffoldError } from '../../scaffold/scaffold.js';
import { renderBanner } from '../../ui/banner.js';
import { loadConfig } from '../../utils/config.js';
import { ErrorHandler, ForgeLoopError, getErrorHint } from '../../utils/error-handler.js';
import { log, logger, LogLevel } from '../../utils/logger.js';

export interface InitCommandOptions {
  agent?: string;
  script?: string;
  here?: boolean;
  force?: boolean;
  githubToken?: string;
  debug?: boolean;
}

function isInteractive(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

async function resolveAgent(requested: string | undefined): Promise<string> {
  if (requested) return requested;
  if (!isInteractive()) return DEFAULT_AGENT;

  return select({
    message: 'Choose your coding agent',
    choices: listAgents().map((agent) => ({
      name: `${agent.key} ${chalk.dim(`(${agent.name})`)}`,
      value: agent.key,
    })),
    default: DEFAULT_AGENT,
  });
}

async function resolveScript(requested: string | undefined): Promise<ScriptType> {
  if (requested) {
    if (!isScriptType(requested)) {
      throw new ForgeLoopError(`Invalid script type "${requested}". Choose one of: sh, ps`, 'init');
    }
    return requested;
  }
  if (!isInteractive()) return defaultScriptType();

  return select<ScriptType>({
    message: 'Choose script type',
    choices: SCRIPT_TYPE_KEYS.map((key) => ({
      name: `${key} ${chalk.dim(`(${SCRIPT_TYPES[key]})`)}`,
      value: key,
    })),
    default: defaultScriptType(),
  });
}

export function resolveProjectDir(
  projectName: string | undefined,
  here: boolean | undefined,
  cwd: string = process.cwd()
): { projectDir: string; here: boolean } {
  const inPlace = here === true || projectName === '.';
  if (inPlace) {
    if (projectName && projectName !== '.') {
      throw new ForgeLoopError('Cannot combine a project name with --here', 'init');
    }
    return { projectDir: cwd, here: true };
  }
  if (!projectName) {
    throw new ForgeLoopError('Specify a project name, "." or --here', 'init');
  }
  return { projectDir: path.resolve(cwd, projectName), here: false };
}

function printNextSteps(projectDir: string, here: boolean, agent: AgentConfig): void {
  log.newline();
  log.success(chalk.bold('Project ready.'));
  if (!here) {
    log.info(`  ${chalk.dim('1.')} cd ${path.basename(projectDir)}`);
  }
  log.info(`  ${chalk.dim(here ? '1.' : '2.')} Open the project with ${chalk.cyan(agent.name)}`);
  log.info(`     Agent commands live in ${chalk.cyan(agent.folder)}`);
  if (agent.requiresCli && agent.installUrl) {
    log.info(chalk.dim(`     ${agent.name} is a CLI tool; install it from ${agent.installUrl}`));
  }
}

export async function initCommand(projectName: string | undefined, options: InitCommandOptions): Promise<void> {
  if (options.debug) log.setLevel(LogLevel.DEBUG);

  const target = resolveProjectDir(projectName, options.here);
  process.stdout.write(renderBanner() + '\n');

  const agentKey = await resolveAgent(options.agent);
  const script = await resolveScript(options.script);
  const config = await loadConfig();

  const client = await FetchClient.create({
    token: options.githubToken,
    apiBaseUrl: config.github.apiBaseUrl,
    logger,
  });
  const tracker = createScaffoldTracker(logger);
  const display = new LiveDisplay(() => tracker.render(), {
    refreshIntervalMs: config.display.refreshIntervalMs,
  });

  try {
    const result = await runScaffold(
      {
        projectDir: target.projectDir,
        here: target.here,
        force: options.force === true,
        agent: agentKey,
        script,
      },
      { client, repo: config.github, logger, tracker, display }
    );

    printNextSteps(result.projectDir, target.here, result.agent);
  } catch (error) {
    if (error instanceof ScaffoldError) {
      const cause = error.originalError;
      const report = ErrorHandler.getDiagnostic(cause) ?? ErrorHandler.getErrorMessage(cause);
      process.stderr.write('\n' + report + '\n\n');
      const hint = cause instanceof RemoteRequestError && cause.isRateLimited ? undefined : getErrorHint(report);
      if (hint) log.warn(hint);
      logger.debug(`init aborted at "${error.step}"`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await client.close();
  }
}
