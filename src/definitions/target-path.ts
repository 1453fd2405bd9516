// Resolves a definition's target file to an absolute path

import * as path from 'path';
import { simpleGit } from 'simple-git';
import { TargetPathError, errorMessage } from '../core/errors.js';
import { TargetPathType } from '../models/types.js';

/**
 * Asks git for the top-level directory of the repository containing `cwd`
 */
export async function resolveGitRoot(cwd: string): Promise<string> {
  try {
    const root = await simpleGit(cwd).revparse(['--show-toplevel']);
    return root.trim();
  } catch (error) {
    throw new TargetPathError(`${cwd} is not inside a git repository`, { cwd, cause: errorMessage(error) });
  }
}

export async function resolveTargetPath(
  targetFile: unknown,
  pathType: TargetPathType,
  cwd: string = process.cwd()
): Promise<string> {
  if (typeof targetFile !== 'string' || targetFile.trim() === '') {
    throw new TargetPathError('Target file is empty', { targetFile });
  }

  switch (pathType) {
    case 'absolute':
      if (!path.isAbsolute(targetFile)) {
        throw new TargetPathError(`Target file "${targetFile}" is not an absolute path`, { targetFile });
      }
      return path.normalize(targetFile);
    case 'relativeToGitRoot':
      return path.resolve(await resolveGitRoot(cwd), targetFile);
    case 'relativeToCurrentDir':
      return path.resolve(cwd, targetFile);
  }
}
