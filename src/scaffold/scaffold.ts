/**
 * Scaffold run: fetch the template release for an agent and unpack it
 *
 * Each phase is a tracker step. A failure marks the step it happened in as
 * `error` and is rethrown as a ScaffoldError; the tracker is left in place so
 * the caller can print the final tree next to the diagnostic.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { getAgent, type AgentConfig, type ScriptType } from '../agents/agent-config.js';
import { RemoteRequestError } from '../github/errors.js';
import type { FetchClient } from '../github/fetch-client.js';
import {
  downloadTemplate,
  fetchLatestRelease,
  selectTemplateAsset,
  TemplateNotFoundError,
  type ReleaseInfo,
  type RepoRef,
} from '../github/releases.js';
import { StepTracker } from '../progress/step-tracker.js';
import { ErrorHandler, ForgeLoopError } from '../utils/error-handler.js';
import type { Logger } from '../utils/logger.js';
import {
  DestinationNotEmptyError,
  extractTemplate,
  isEmptyDirectory,
  markScriptsExecutable,
} from './extract.js';

export const SCAFFOLD_STEPS = [
  ['precheck', 'Check target directory'],
  ['agent', 'Select coding agent'],
  ['script', 'Select script type'],
  ['fetch', 'Fetch latest release'],
  ['download', 'Download template'],
  ['extract', 'Extract template'],
  ['permissions', 'Ensure scripts executable'],
  ['cleanup', 'Remove temporary files'],
  ['final', 'Finalize'],
] as const;

export type ScaffoldStepKey = (typeof SCAFFOLD_STEPS)[number][0];

export interface ScaffoldOptions {
  projectDir: string;
  /** Initialize the current directory, merging with what is there */
  here: boolean;
  /** Merge into a non-empty project directory */
  force: boolean;
  agent: string;
  script: ScriptType;
}

/** The subset of LiveDisplay the run drives */
export interface ProgressSink {
  start(): void;
  requestRedraw(): void;
  stop(): void;
}

export interface ScaffoldDeps {
  client: FetchClient;
  repo: RepoRef;
  logger?: Logger;
  tracker?: StepTracker;
  display?: ProgressSink;
  /** Parent of the temporary download directory (default: os.tmpdir()) */
  tempRoot?: string;
}

export interface ScaffoldResult {
  tracker: StepTracker;
  projectDir: string;
  agent: AgentConfig;
  release: ReleaseInfo;
  files: string[];
}

export class UnknownAgentError extends ForgeLoopError {
  constructor(public readonly agent: string) {
    super(`Unknown agent "${agent}". Run "forgeloop agents" to list supported agents.`, 'scaffold');
    this.name = 'UnknownAgentError';
  }
}

export class ScaffoldError extends ForgeLoopError {
  constructor(
    public readonly step: ScaffoldStepKey,
    public readonly tracker: StepTracker,
    originalError: unknown
  ) {
    super(`Scaffold failed at "${step}": ${ErrorHandler.getErrorMessage(originalError)}`, 'scaffold', originalError);
    this.name = 'ScaffoldError';
  }
}

export function createScaffoldTracker(logger?: Logger): StepTracker {
  const tracker = new StepTracker('Initialize ForgeLoop Project', { logger });
  for (const [key, label] of SCAFFOLD_STEPS) {
    tracker.add(key, label);
  }
  return tracker;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Short text for the tracker line of a failed step. The full report
 * (e.g. the rate-limit diagnostic) is printed by the caller.
 */
export function describeStepFailure(error: unknown): string {
  if (error instanceof RemoteRequestError) {
    switch (error.kind) {
      case 'rate_limit':
        return `rate limited (HTTP ${error.status})`;
      case 'http':
        return `HTTP ${error.status}`;
      case 'network':
        return 'network error';
    }
  }
  if (error instanceof TemplateNotFoundError) {
    return 'no matching template asset';
  }
  return ErrorHandler.getErrorMessage(error);
}

export async function runScaffold(options: ScaffoldOptions, deps: ScaffoldDeps): Promise<ScaffoldResult> {
  const { client, repo, logger, display } = deps;
  const tracker = deps.tracker ?? createScaffoldTracker(logger);
  const projectDir = path.resolve(options.projectDir);

  let current: ScaffoldStepKey = 'precheck';
  const begin = (key: ScaffoldStepKey, detail?: string): void => {
    current = key;
    tracker.start(key, detail);
  };

  if (display) {
    tracker.attachRefresh(() => display.requestRedraw());
    display.start();
  }

  let tempDir: string | undefined;
  try {
    begin('precheck');
    const merge = options.here || options.force;
    if (!merge && !(await isEmptyDirectory(projectDir))) {
      throw new DestinationNotEmptyError(projectDir);
    }
    tracker.complete('precheck', options.here ? 'current directory' : projectDir);

    begin('agent');
    const agent = getAgent(options.agent);
    if (!agent) {
      throw new UnknownAgentError(options.agent);
    }
    tracker.complete('agent', agent.name);

    begin('script');
    tracker.complete('script', options.script);

    begin('fetch', `${repo.owner}/${repo.repo}`);
    const release = await fetchLatestRelease(client, repo);
    const asset = selectTemplateAsset(release, agent.key, options.script);
    tracker.complete('fetch', `release ${release.tagName}`);

    begin('download', asset.name);
    tempDir = await fs.mkdtemp(path.join(deps.tempRoot ?? os.tmpdir(), 'forgeloop-'));
    const archive = await downloadTemplate(client, asset, tempDir);
    tracker.complete('download', `${asset.name} (${formatBytes(archive.size)})`);

    begin('extract');
    const extracted = await extractTemplate(archive.path, projectDir, { merge });
    tracker.complete('extract', `${extracted.files.length} files`);

    if (options.script === 'sh') {
      begin('permissions');
      const updated = await markScriptsExecutable(projectDir);
      tracker.complete('permissions', `${updated} updated`);
    } else {
      tracker.skip('permissions', 'PowerShell scripts');
    }

    begin('cleanup');
    await fs.rm(tempDir, { recursive: true, force: true });
    tempDir = undefined;
    tracker.complete('cleanup');

    tracker.complete('final', 'project ready');
    return { tracker, projectDir, agent, release, files: extracted.files };
  } catch (error) {
    tracker.error(current, describeStepFailure(error));
    logger?.debug(`scaffold step "${current}" failed: ${ErrorHandler.getErrorMessage(error)}`);
    throw new ScaffoldError(current, tracker, error);
  } finally {
    display?.stop();
    tracker.detachRefresh();
    if (tempDir) {
      const dir = tempDir;
      await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
        logger?.debug(`could not remove temporary directory ${dir}: ${ErrorHandler.getErrorMessage(error)}`);
      });
    }
  }
}
