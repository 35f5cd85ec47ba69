import path from 'path';
import { ForgeLoopError } from '../../utils/error-handler.js';
import { resolveProjectDir } from './init.js';

describe('resolveProjectDir', () => {
  const cwd = path.resolve('/work');

  it('creates a sub-directory for a project name', () => {
    expect(resolveProjectDir('my-app', undefined, cwd)).toEqual({
      projectDir: path.join(cwd, 'my-app'),
      here: false,
    });
  });

  it('uses the current directory for "." or --here', () => {
    expect(resolveProjectDir('.', undefined, cwd)).toEqual({ projectDir: cwd, here: true });
    expect(resolveProjectDir(undefined, true, cwd)).toEqual({ projectDir: cwd, here: true });
    expect(resolveProjectDir('.', true, cwd)).toEqual({ projectDir: cwd, here: true });
  });

  it('rejects a project name together with --here', () => {
    expect(() => resolveProjectDir('my-app', true, cwd)).toThrow('Cannot combine a project name with --here');
  });

  it('requires a project name or --here', () => {
    expect(() => resolveProjectDir(undefined, false, cwd)).toThrow(ForgeLoopError);
    expect(() => resolveProjectDir(undefined, undefined, cwd)).toThrow('Specify a project name, "." or --here');
  });
});
