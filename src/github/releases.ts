// Template releases: latest release lookup, asset selection, download

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ForgeLoopError } from '../utils/error-handler.js';
import type { ScriptType } from '../agents/agent-config.js';
import type { FetchClient } from './fetch-client.js';

const ReleaseAssetSchema = z
  .object({
    name: z.string(),
    size: z.number().int().nonnegative(),
    browser_download_url: z.string().url(),
  })
  .transform((asset) => ({
    name: asset.name,
    size: asset.size,
    browserDownloadUrl: asset.browser_download_url,
  }));

export const ReleaseSchema = z
  .object({
    tag_name: z.string(),
    name: z.string().nullable().optional(),
    assets: z.array(ReleaseAssetSchema),
  })
  .transform((release) => ({
    tagName: release.tag_name,
    name: release.name ?? release.tag_name,
    assets: release.assets,
  }));

export type ReleaseInfo = z.output<typeof ReleaseSchema>;
export type ReleaseAsset = ReleaseInfo['assets'][number];

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface DownloadedTemplate {
  path: string;
  size: number;
  asset: ReleaseAsset;
}

export class TemplateNotFoundError extends ForgeLoopError {
  constructor(
    public readonly pattern: string,
    public readonly available: string[]
  ) {
    super(
      `No release asset matches ${pattern}. Available: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      'releases'
    );
    this.name = 'TemplateNotFoundError';
  }
}

export function templateAssetPrefix(agent: string, script: ScriptType): string {
  return `forge-loop-template-${agent}-${script}`;
}

export async function fetchLatestRelease(client: FetchClient, ref: RepoRef): Promise<ReleaseInfo> {
  const url = client.apiUrl(`repos/${ref.owner}/${ref.repo}/releases/latest`);
  return client.getJson(url, ReleaseSchema);
}

export function selectTemplateAsset(release: ReleaseInfo, agent: string, script: ScriptType): ReleaseAsset {
  const prefix = templateAssetPrefix(agent, script);
  // "-" after the prefix keeps e.g. "q-sh" from matching "qwen-sh"
  const match = release.assets.find(
    (asset) => asset.name.startsWith(`${prefix}-`) && asset.name.endsWith('.zip')
  );
  if (!match) {
    throw new TemplateNotFoundError(
      `${prefix}-*.zip`,
      release.assets.map((asset) => asset.name)
    );
  }
  return match;
}

export async function downloadTemplate(
  client: FetchClient,
  asset: ReleaseAsset,
  directory: string
): Promise<DownloadedTemplate> {
  const data = await client.download(asset.browserDownloadUrl);
  const target = path.join(directory, path.basename(asset.name));
  await fs.mkdir(directory, { recursive: true });
  await fs.writeFile(target, data);
  return { path: target, size: data.length, asset };
}
