// Template archive extraction

import { promises as fs } from 'fs';
import path from 'path';
import AdmZip from 'adm-zip';
import { ForgeLoopError, hasErrorCode } from '../utils/error-handler.js';

export interface ExtractOptions {
  /** Write into an existing, possibly non-empty directory (default: false) */
  merge?: boolean;
}

export interface ExtractResult {
  /** Written files, relative to the destination, with forward slashes */
  files: string[];
  /** Top-level folder that was stripped from every entry, if any */
  strippedRoot?: string;
}

export class UnsafeArchiveEntryError extends ForgeLoopError {
  constructor(public readonly entryName: string) {
    super(`Archive entry escapes the destination directory: ${entryName}`, 'extract');
    this.name = 'UnsafeArchiveEntryError';
  }
}

export class DestinationNotEmptyError extends ForgeLoopError {
  constructor(public readonly destination: string) {
    super(`Directory ${destination} already exists and is not empty`, 'extract');
    this.name = 'DestinationNotEmptyError';
  }
}

function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\.\/+/, '');
}

/**
 * The single folder every entry lives under, when the archive has one.
 */
export function commonRootFolder(entryNames: string[]): string | undefined {
  let root: string | undefined;
  let hasNestedFile = false;

  for (const name of entryNames) {
    const segments = normalizeEntryName(name).split('/').filter(Boolean);
    if (segments.length === 0) continue;

    const isRootDirectory = segments.length === 1 && name.endsWith('/');
    if (segments.length === 1 && !isRootDirectory) {
      // A file at the archive root
      return undefined;
    }

    if (root === undefined) {
      root = segments[0];
    } else if (root !== segments[0]) {
      return undefined;
    }

    if (segments.length > 1) hasNestedFile = true;
  }

  return hasNestedFile ? root : undefined;
}

/**
 * Absolute output path for an archive entry, refusing paths outside `target`.
 */
export function resolveEntryPath(target: string, relative: string, entryName: string = relative): string {
  const root = path.resolve(target);
  const output = path.resolve(root, relative);
  if (output !== root && !output.startsWith(root + path.sep)) {
    throw new UnsafeArchiveEntryError(entryName);
  }
  return output;
}

export async function isEmptyDirectory(directory: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(directory);
    return entries.length === 0;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return true;
    }
    throw error;
  }
}

export async function extractTemplate(
  archive: string | Buffer,
  destination: string,
  options: ExtractOptions = {}
): Promise<ExtractResult> {
  const target = path.resolve(destination);

  if (!options.merge && !(await isEmptyDirectory(target))) {
    throw new DestinationNotEmptyError(target);
  }

  const zip = new AdmZip(archive);
  const entries = zip.getEntries();
  const strippedRoot = commonRootFolder(entries.map((entry) => entry.entryName));

  const files: string[] = [];
  await fs.mkdir(target, { recursive: true });

  for (const entry of entries) {
    let relative = normalizeEntryName(entry.entryName);
    if (strippedRoot) {
      relative = relative.slice(strippedRoot.length + 1);
    }
    if (!relative) continue;

    const output = resolveEntryPath(target, relative, entry.entryName);

    if (entry.isDirectory) {
      await fs.mkdir(output, { recursive: true });
      continue;
    }

    await fs.mkdir(path.dirname(output), { recursive: true });
    await fs.writeFile(output, entry.getData());
    files.push(relative.replace(/\/+$/, ''));
  }

  return { files, strippedRoot };
}

/**
 * Mark shell scripts under `directory` executable. No-op on Windows.
 * Returns the number of files updated.
 */
export async function markScriptsExecutable(
  directory: string,
  platform: NodeJS.Platform = process.platform
): Promise<number> {
  if (platform === 'win32') return 0;

  let updated = 0;
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '.git' || entry.name === 'node_modules') continue;
      updated += await markScriptsExecutable(full, platform);
    } else if (entry.isFile() && entry.name.endsWith('.sh')) {
      const stat = await fs.stat(full);
      if ((stat.mode & 0o111) !== 0o111) {
        await fs.chmod(full, 0o755);
        updated += 1;
      }
    }
  }
  return updated;
}
