// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { getConfigFilePath } from './app-paths.js';
import { ForgeLoopError, hasErrorCode } from './error-handler.js';

// Load .env file
dotenv.config();

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

const GitHubConfigSchema = z.object({
  owner: z.string().min(1).default('forgeloop'),
  repo: z.string().min(1).default('forgeloop'),
  apiBaseUrl: z.string().url().default(DEFAULT_GITHUB_API_URL),
});

const DisplayConfigSchema = z.object({
  // Minimum delay between two redraws of the live progress tree
  refreshIntervalMs: z.number().int().min(0).max(2000).default(80),
});

export const AppConfigSchema = z.object({
  github: GitHubConfigSchema.default({}),
  display: DisplayConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ConfigInput = z.input<typeof AppConfigSchema>;

export class ConfigError extends ForgeLoopError {
  constructor(message: string, public readonly file: string, originalError?: unknown) {
    super(message, 'config', originalError);
    this.name = 'ConfigError';
  }
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

async function readConfigFile(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${file}`, file, error);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON`, file, error);
  }
}

function validateConfig(value: unknown, file: string): AppConfig {
  const result = AppConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${file}: ${issues}`, file, result.error);
  }
  return result.data;
}

export async function loadConfig(file: string = getConfigFilePath()): Promise<AppConfig> {
  return validateConfig(await readConfigFile(file), file);
}

/**
 * Deep-merge `update` into the stored config, validate, and write it back.
 */
export async function saveConfig(update: ConfigInput | PlainObject, file: string = getConfigFilePath()): Promise<AppConfig> {
  const current = await loadConfig(file);
  const merged = validateConfig(deepMerge(current, update), file);

  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(merged, null, 2), 'utf-8');
  return merged;
}

function lookup(source: unknown, key: string): unknown {
  let current = source;
  for (const part of key.split('.')) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Value at a dotted key such as `github.owner`; undefined for unknown keys.
 */
export async function getConfigValue(key: string, file: string = getConfigFilePath()): Promise<unknown> {
  return lookup(await loadConfig(file), key);
}

function parseValue(raw: string): string | number | boolean {
  if (/^-?\d+$/.test(raw)) return Number.parseInt(raw, 10);
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return raw;
}

/**
 * Set one leaf setting from its string form and persist the result.
 * Only keys present in the defaults can be set.
 */
export async function setConfigValue(key: string, raw: string, file: string = getConfigFilePath()): Promise<AppConfig> {
  const existing = lookup(getDefaultConfig(), key);
  if (existing === undefined || isPlainObject(existing)) {
    throw new ConfigError(`Unknown config key "${key}"`, file);
  }

  let update: PlainObject = { [key.split('.').pop() ?? key]: parseValue(raw) };
  for (const part of key.split('.').slice(0, -1).reverse()) {
    update = { [part]: update };
  }
  return saveConfig(update, file);
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    if (incoming === undefined) continue;
    const existing = result[key];
    if (isPlainObject(incoming) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
