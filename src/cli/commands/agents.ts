// List supported agents

import chalk from 'chalk';
import { listAgents, type AgentConfig } from '../../agents/agent-config.js';
import { log } from '../../utils/logger.js';

export function formatAgentTable(agents: readonly AgentConfig[]): string[] {
  const keyWidth = Math.max(3, ...agents.map((agent) => agent.key.length));
  const nameWidth = Math.max(4, ...agents.map((agent) => agent.name.length));

  const lines = [
    chalk.bold(`${'Key'.padEnd(keyWidth)}  ${'Name'.padEnd(nameWidth)}  Folder`),
  ];
  for (const agent of agents) {
    const cli = agent.requiresCli ? chalk.dim(' (CLI)') : '';
    lines.push(`${chalk.cyan(agent.key.padEnd(keyWidth))}  ${agent.name.padEnd(nameWidth)}  ${agent.folder}${cli}`);
  }
  return lines;
}

export async function agentsCommand(): Promise<void> {
  for (const line of formatAgentTable(listAgents())) {
    log.info(line);
  }
}
