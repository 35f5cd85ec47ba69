import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';
import {
  commonRootFolder,
  DestinationNotEmptyError,
  extractTemplate,
  isEmptyDirectory,
  markScriptsExecutable,
  resolveEntryPath,
  UnsafeArchiveEntryError,
} from './extract.js';

function buildArchive(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content));
  }
  return zip.toBuffer();
}

describe('commonRootFolder', () => {
  it('finds the single top-level folder', () => {
    expect(commonRootFolder(['template/', 'template/README.md', 'template/scripts/setup.sh'])).toBe('template');
  });

  it('is undefined when a file sits at the archive root', () => {
    expect(commonRootFolder(['README.md', 'scripts/setup.sh'])).toBeUndefined();
  });

  it('is undefined with more than one top-level folder', () => {
    expect(commonRootFolder(['a/one.txt', 'b/two.txt'])).toBeUndefined();
  });

  it('is undefined for a folder without contents', () => {
    expect(commonRootFolder(['empty/'])).toBeUndefined();
  });
});

describe('resolveEntryPath', () => {
  const target = path.resolve('/tmp/forgeloop-target');

  it('resolves a nested entry inside the target', () => {
    expect(resolveEntryPath(target, 'scripts/setup.sh')).toBe(path.join(target, 'scripts', 'setup.sh'));
  });

  it('rejects entries that climb out of the target', () => {
    expect(() => resolveEntryPath(target, '../outside.txt')).toThrow(UnsafeArchiveEntryError);
    expect(() => resolveEntryPath(target, 'a/../../outside.txt', 'evil.zip-entry')).toThrow(
      'Archive entry escapes the destination directory: evil.zip-entry'
    );
  });

  it('rejects a sibling directory sharing the target prefix', () => {
    expect(() => resolveEntryPath(target, '../forgeloop-target-other/x')).toThrow(UnsafeArchiveEntryError);
  });
});

describe('on disk', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forgeloop-extract-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('isEmptyDirectory', () => {
    it('treats a missing directory as empty', async () => {
      await expect(isEmptyDirectory(path.join(workDir, 'nope'))).resolves.toBe(true);
    });

    it('treats a missing parent directory as empty', async () => {
      await expect(isEmptyDirectory(path.join(workDir, 'a', 'b', 'c'))).resolves.toBe(true);
    });

    it('rethrows errors other than a missing directory', async () => {
      const file = path.join(workDir, 'plain.txt');
      await fs.writeFile(file, 'x');

      await expect(isEmptyDirectory(file)).rejects.toMatchObject({ code: 'ENOTDIR' });
    });

    it('is false once the directory has an entry', async () => {
      await expect(isEmptyDirectory(workDir)).resolves.toBe(true);
      await fs.writeFile(path.join(workDir, 'file.txt'), 'x');
      await expect(isEmptyDirectory(workDir)).resolves.toBe(false);
    });
  });

  describe('extractTemplate', () => {
    it('strips the common root folder and returns written files', async () => {
      const archive = buildArchive({
        'forge-loop-main/README.md': '# project',
        'forge-loop-main/.github/prompts/plan.md': 'plan',
        'forge-loop-main/scripts/bash/setup.sh': '#!/bin/sh\necho hi\n',
      });
      const destination = path.join(workDir, 'project');

      const result = await extractTemplate(archive, destination);

      expect(result.strippedRoot).toBe('forge-loop-main');
      expect([...result.files].sort()).toEqual(['.github/prompts/plan.md', 'README.md', 'scripts/bash/setup.sh']);
      await expect(fs.readFile(path.join(destination, 'README.md'), 'utf-8')).resolves.toBe('# project');
    });

    it('keeps paths as they are without a common root', async () => {
      const archive = buildArchive({ 'README.md': 'a', 'memory/notes.md': 'b' });

      const result = await extractTemplate(archive, workDir);

      expect(result.strippedRoot).toBeUndefined();
      expect([...result.files].sort()).toEqual(['README.md', 'memory/notes.md']);
    });

    it('refuses a non-empty destination unless merging', async () => {
      await fs.writeFile(path.join(workDir, 'existing.txt'), 'keep me');
      const archive = buildArchive({ 'README.md': 'new' });

      await expect(extractTemplate(archive, workDir)).rejects.toBeInstanceOf(DestinationNotEmptyError);

      const merged = await extractTemplate(archive, workDir, { merge: true });
      expect(merged.files).toEqual(['README.md']);
      await expect(fs.readFile(path.join(workDir, 'existing.txt'), 'utf-8')).resolves.toBe('keep me');
    });

    it('reads an archive from a file path', async () => {
      const zipPath = path.join(workDir, 'template.zip');
      await fs.writeFile(zipPath, buildArchive({ 'root/a.txt': 'a' }));

      const result = await extractTemplate(zipPath, path.join(workDir, 'out'));

      expect(result.files).toEqual(['a.txt']);
    });
  });

  describe('markScriptsExecutable', () => {
    it('sets the executable bits on shell scripts only', async () => {
      await fs.mkdir(path.join(workDir, 'scripts', 'bash'), { recursive: true });
      await fs.mkdir(path.join(workDir, 'node_modules', 'pkg'), { recursive: true });
      await fs.writeFile(path.join(workDir, 'scripts', 'bash', 'setup.sh'), '#!/bin/sh\n', { mode: 0o644 });
      await fs.writeFile(path.join(workDir, 'scripts', 'README.md'), 'docs', { mode: 0o644 });
      await fs.writeFile(path.join(workDir, 'node_modules', 'pkg', 'install.sh'), '#!/bin/sh\n', { mode: 0o644 });

      const updated = await markScriptsExecutable(workDir, 'linux');

      expect(updated).toBe(1);
      const script = await fs.stat(path.join(workDir, 'scripts', 'bash', 'setup.sh'));
      expect(script.mode & 0o777).toBe(0o755);
      const readme = await fs.stat(path.join(workDir, 'scripts', 'README.md'));
      expect(readme.mode & 0o111).toBe(0);
    });

    it('leaves scripts that are already executable alone', async () => {
      const script = path.join(workDir, 'run.sh');
      await fs.writeFile(script, '#!/bin/sh\n');
      await fs.chmod(script, 0o755);

      await expect(markScriptsExecutable(workDir, 'linux')).resolves.toBe(0);
    });

    it('does nothing on Windows', async () => {
      await fs.writeFile(path.join(workDir, 'run.sh'), '#!/bin/sh\n', { mode: 0o644 });

      await expect(markScriptsExecutable(workDir, 'win32')).resolves.toBe(0);
    });
  });
});
