import path from 'path';
import os from 'os';

/**
 * Base directory for ForgeLoop state on disk.
 *
 * Override with `FORGELOOP_HOME` (useful for sandboxes/tests/portable installs).
 * Default: `~/.forgeloop`
 */
export function getForgeLoopHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.FORGELOOP_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.forgeloop');
}

export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getForgeLoopHomeDir(env), 'config.json');
}
