// Supported coding agents and the script flavours templates ship with

export interface AgentConfig {
  key: string;
  name: string;
  /** Folder the agent reads its commands from, relative to the project root */
  folder: string;
  installUrl?: string;
  /** Whether the agent is a CLI tool that must be on PATH */
  requiresCli: boolean;
}

export const AGENTS: readonly AgentConfig[] = [
  { key: 'copilot', name: 'GitHub Copilot', folder: '.github/', requiresCli: false },
  {
    key: 'claude',
    name: 'Claude Code',
    folder: '.claude/',
    installUrl: 'https://docs.anthropic.com/en/docs/claude-code/setup',
    requiresCli: true,
  },
  {
    key: 'gemini',
    name: 'Gemini CLI',
    folder: '.gemini/',
    installUrl: 'https://github.com/google-gemini/gemini-cli',
    requiresCli: true,
  },
  { key: 'cursor-agent', name: 'Cursor', folder: '.cursor/', requiresCli: false },
  {
    key: 'qwen',
    name: 'Qwen Code',
    folder: '.qwen/',
    installUrl: 'https://github.com/QwenLM/qwen-code',
    requiresCli: true,
  },
  { key: 'opencode', name: 'opencode', folder: '.opencode/', installUrl: 'https://opencode.ai', requiresCli: true },
  {
    key: 'codex',
    name: 'Codex CLI',
    folder: '.codex/',
    installUrl: 'https://github.com/openai/codex',
    requiresCli: true,
  },
  { key: 'windsurf', name: 'Windsurf', folder: '.windsurf/', requiresCli: false },
  { key: 'kilocode', name: 'Kilo Code', folder: '.kilocode/', requiresCli: false },
  {
    key: 'auggie',
    name: 'Auggie CLI',
    folder: '.augment/',
    installUrl: 'https://docs.augmentcode.com/cli/setup-auggie/install-auggie-cli',
    requiresCli: true,
  },
  {
    key: 'codebuddy',
    name: 'CodeBuddy',
    folder: '.codebuddy/',
    installUrl: 'https://www.codebuddy.ai/cli',
    requiresCli: true,
  },
  { key: 'roo', name: 'Roo Code', folder: '.roo/', requiresCli: false },
  {
    key: 'q',
    name: 'Amazon Q Developer CLI',
    folder: '.amazonq/',
    installUrl: 'https://aws.amazon.com/developer/learning/q-developer-cli/',
    requiresCli: true,
  },
  { key: 'amp', name: 'Amp', folder: '.agents/', installUrl: 'https://ampcode.com/manual#install', requiresCli: true },
  { key: 'shai', name: 'SHAI', folder: '.shai/', installUrl: 'https://github.com/ovh/shai', requiresCli: true },
];

export const DEFAULT_AGENT = 'copilot';

export type ScriptType = 'sh' | 'ps';

export const SCRIPT_TYPE_KEYS: readonly ScriptType[] = ['sh', 'ps'];

export const SCRIPT_TYPES: Record<ScriptType, string> = {
  sh: 'POSIX Shell (bash/zsh)',
  ps: 'PowerShell',
};

export function getAgent(key: string): AgentConfig | undefined {
  return AGENTS.find((agent) => agent.key === key);
}

export function listAgents(): readonly AgentConfig[] {
  return AGENTS;
}

export function isScriptType(value: string): value is ScriptType {
  return value === 'sh' || value === 'ps';
}

export function defaultScriptType(platform: NodeJS.Platform = process.platform): ScriptType {
  return platform === 'win32' ? 'ps' : 'sh';
}
