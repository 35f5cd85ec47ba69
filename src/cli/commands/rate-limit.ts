// Show the GitHub API quota for the current credentials

import chalk from 'chalk';
import { RemoteRequestError } from '../../github/errors.js';
import { FetchClient } from '../../github/fetch-client.js';
import { formatRateLimitFacts, type RateLimitInfo } from '../../github/rate-limit.js';
import { loadConfig } from '../../utils/config.js';
import { log, logger as defaultLogger, LogLevel, type Logger } from '../../utils/logger.js';

export interface RateLimitReportOptions {
  logger?: Logger;
  /** Where a failed request's diagnostic goes (default: stderr) */
  errorStream?: NodeJS.WritableStream;
}

/**
 * Print the quota for the client's credentials.
 * Returns false when the API refused the request; its diagnostic has been written.
 */
export async function reportRateLimit(client: FetchClient, options: RateLimitReportOptions = {}): Promise<boolean> {
  const out = options.logger ?? defaultLogger;
  const errorStream = options.errorStream ?? process.stderr;

  let info: RateLimitInfo;
  try {
    info = await client.rateLimitStatus();
  } catch (error) {
    if (error instanceof RemoteRequestError) {
      errorStream.write('\n' + error.diagnostic + '\n\n');
      return false;
    }
    throw error;
  }

  out.info(chalk.bold('Authenticated: ') + (client.isAuthenticated ? chalk.green('yes') : chalk.yellow('no')));

  const facts = formatRateLimitFacts(info);
  if (facts.length === 0) {
    out.info(chalk.dim('The API returned no rate-limit headers.'));
    return true;
  }
  for (const line of facts) {
    out.info(line);
  }
  return true;
}

export async function rateLimitCommand(options: { githubToken?: string; debug?: boolean }): Promise<void> {
  if (options.debug) log.setLevel(LogLevel.DEBUG);

  const config = await loadConfig();
  const client = await FetchClient.create({
    token: options.githubToken,
    apiBaseUrl: config.github.apiBaseUrl,
    logger: defaultLogger,
  });

  try {
    if (!(await reportRateLimit(client))) {
      process.exitCode = 1;
    }
  } finally {
    await client.close();
  }
}
