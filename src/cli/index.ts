// CLI setup with Commander

import { Command } from 'commander';
import { agentsCommand } from './commands/agents.js';
import { configCommand } from './commands/config.js';
import { initCommand } from './commands/init.js';
import { rateLimitCommand } from './commands/rate-limit.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('forgeloop')
    .description('Set up ForgeLoop projects for your coding agent')
    .version('0.1.0');

  program
    .command('init [project-name]')
    .description('Initialize a new project from the latest template ("." for the current directory)')
    .option('-a, --agent <key>', 'Coding agent to configure (see "forgeloop agents")')
    .option('-s, --script <type>', 'Script flavour: sh or ps')
    .option('--here', 'Initialize in the current directory')
    .option('--force', 'Merge into a non-empty directory without asking')
    .option('--github-token <token>', 'GitHub token for API requests (or set GH_TOKEN / GITHUB_TOKEN)')
    .option('--debug', 'Verbose diagnostic output')
    .action(initCommand);

  program
    .command('agents')
    .description('List supported coding agents')
    .action(agentsCommand);

  program
    .command('rate-limit')
    .description('Show the GitHub API quota for the current credentials')
    .option('--github-token <token>', 'GitHub token for API requests (or set GH_TOKEN / GITHUB_TOKEN)')
    .option('--debug', 'Verbose diagnostic output')
    .action(rateLimitCommand);

  program
    .command('config')
    .description('Manage CLI configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .action(configCommand);

  return program;
}
