/**
 * Tests for target path resolution
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as path from 'path';
import { resolveGitRoot, resolveTargetPath } from './target-path.js';
import { TargetPathError } from '../core/errors.js';

const { revparse } = vi.hoisted(() => ({ revparse: vi.fn() }));

vi.mock('simple-git', () => ({
  simpleGit: () => ({ revparse })
}));

const CWD = path.resolve('/work/project/sub');

describe('resolveTargetPath', () => {
  beforeEach(() => {
    revparse.mockReset();
  });

  it('should resolve relative to the current directory by default', async () => {
    expect(await resolveTargetPath('ci/build.yml', 'relativeToCurrentDir', CWD))
      .toBe(path.join(CWD, 'ci', 'build.yml'));
  });

  it('should resolve relative to the git root', async () => {
    const root = path.resolve('/work/project');
    revparse.mockResolvedValue(`${root}\n`);

    expect(await resolveTargetPath('.ci/build.yml', 'relativeToGitRoot', CWD))
      .toBe(path.join(root, '.ci', 'build.yml'));
    expect(revparse).toHaveBeenCalledWith(['--show-toplevel']);
  });

  it('should normalize absolute paths', async () => {
    const target = [path.resolve('/work'), 'out', '..', 'ci', 'build.yml'].join(path.sep);

    expect(await resolveTargetPath(target, 'absolute', CWD)).toBe(path.resolve('/work/ci/build.yml'));
  });

  it('should reject a relative path declared absolute', async () => {
    await expect(resolveTargetPath('ci/build.yml', 'absolute', CWD))
      .rejects.toThrow('Target file "ci/build.yml" is not an absolute path');
  });

  it('should reject empty and non-string targets', async () => {
    await expect(resolveTargetPath('', 'relativeToCurrentDir', CWD)).rejects.toThrow(TargetPathError);
    await expect(resolveTargetPath('   ', 'relativeToCurrentDir', CWD)).rejects.toThrow('Target file is empty');
    await expect(resolveTargetPath(undefined, 'relativeToCurrentDir', CWD)).rejects.toThrow('Target file is empty');
  });

  it('should fail outside a git repository', async () => {
    revparse.mockRejectedValue(new Error('fatal: not a git repository'));

    await expect(resolveGitRoot(CWD)).rejects.toThrow(`${CWD} is not inside a git repository`);
  });
});
