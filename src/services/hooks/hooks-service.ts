/**
 * Git Hooks Service
 *
 * Installs git hooks and generates CI jobs that re-publish definitions in strict
 * mode, so a commit or pipeline fails when the checked-in YAML is out of date.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { simpleGit, SimpleGit } from 'simple-git';
import { HookError } from '../../core/errors.js';

export type HookName = 'pre-commit' | 'pre-push';

export type CIPlatform = 'github' | 'gitlab';

/**
 * Options for hook installation
 */
export interface HooksInstallOptions {
  husky?: boolean;
  hooks?: HookName[];
  /** Module argument passed to `pipeline-kit publish`; omitted to use config.yaml */
  modulePath?: string;
}

/**
 * Git Hooks Service Interface
 */
export interface IGitHooksService {
  install(options?: HooksInstallOptions): Promise<string[]>;
  uninstall(): Promise<string[]>;
  generateCIScript(platform?: CIPlatform, modulePath?: string): string;
}

/**
 * Identifies hook files written by this service
 */
export const HOOK_MARKER = '# pipeline-kit hook';

const ALL_HOOKS: HookName[] = ['pre-commit', 'pre-push'];

export function publishCommand(modulePath?: string): string {
  return modulePath
    ? `npx pipeline-kit publish ${JSON.stringify(modulePath)} --fail-if-changed`
    : 'npx pipeline-kit publish --fail-if-changed';
}

/**
 * Shell script for a git hook
 */
export function hookScript(hook: HookName, modulePath?: string, husky = false): string {
  const preamble = husky
    ? '#!/usr/bin/env sh\n. "$(dirname -- "$0")/_/husky.sh"\n'
    : '#!/bin/sh\n';

  return `${preamble}${HOOK_MARKER} (${hook})
# Fails when published pipeline files differ from their definitions

echo "Checking that published pipelines are up to date..."
${publishCommand(modulePath)}
if [ $? -ne 0 ]; then
  echo "Pipeline definitions changed. Review and stage the regenerated files, then retry."
  exit 1
fi

exit 0
`;
}

function githubActionsScript(modulePath?: string): string {
  return `name: Validate published pipelines

on:
  push:
  pull_request:

jobs:
  validate:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4

      - name: Setup Node.js
        uses: actions/setup-node@v4
        with:
          node-version: '20'

      - name: Install dependencies
        run: npm ci

      - name: Build definitions
        run: npm run build

      - name: Check published pipelines
        run: ${publishCommand(modulePath)}
`;
}

function gitlabCIScript(modulePath?: string): string {
  return `# Validate published pipelines

stages:
  - validate

validate-pipelines:
  stage: validate
  image: node:20
  script:
    - npm ci
    - npm run build
    - ${publishCommand(modulePath)}
`;
}

/**
 * Git Hooks Service Implementation
 */
export class GitHooksService implements IGitHooksService {
  private git: SimpleGit;
  private baseDir: string;

  constructor(baseDir: string = '.') {
    this.git = simpleGit(baseDir);
    this.baseDir = baseDir;
  }

  private async isGitRepository(): Promise<boolean> {
    try {
      await this.git.revparse(['--git-dir']);
      return true;
    } catch {
      return false;
    }
  }

  private async getGitHooksDir(): Promise<string> {
    const gitDir = await this.git.revparse(['--git-dir']);
    return path.resolve(this.baseDir, gitDir.trim(), 'hooks');
  }

  private async isHuskyInstalled(): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(this.baseDir, '.husky'));
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Installs hooks
   *
   * @returns paths of the hook files written
   * @throws HookError if not a git repository, Husky is missing, or permission is denied
   */
  async install(options: HooksInstallOptions = {}): Promise<string[]> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository', 'Initialize git with "git init" first');
    }

    const hooks = options.hooks ?? ['pre-commit'];
    let hooksDir: string;

    if (options.husky) {
      if (!await this.isHuskyInstalled()) {
        throw new HookError(
          'Husky is not installed',
          'Install Husky first with "npx husky init" or "npm install husky --save-dev"'
        );
      }
      hooksDir = path.join(this.baseDir, '.husky');
    } else {
      hooksDir = await this.getGitHooksDir();
      await fs.mkdir(hooksDir, { recursive: true });
    }

    const written: string[] = [];
    for (const hook of hooks) {
      const hookPath = path.join(hooksDir, hook);
      try {
        await fs.writeFile(hookPath, hookScript(hook, options.modulePath, options.husky), { mode: 0o755 });
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'EACCES') {
          throw new HookError(`Permission denied writing to ${hookPath}`, 'Check file permissions');
        }
        throw error;
      }
      written.push(hookPath);
    }

    return written;
  }

  /**
   * Removes hook files this service wrote, leaving foreign hooks alone
   *
   * @returns paths of the hook files removed
   */
  async uninstall(): Promise<string[]> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository');
    }

    const directories = [await this.getGitHooksDir(), path.join(this.baseDir, '.husky')];
    const removed: string[] = [];

    for (const directory of directories) {
      for (const hook of ALL_HOOKS) {
        const hookPath = path.join(directory, hook);
        if (await this.isOwnHook(hookPath)) {
          await fs.unlink(hookPath);
          removed.push(hookPath);
        }
      }
    }

    return removed;
  }

  private async isOwnHook(hookPath: string): Promise<boolean> {
    try {
      const content = await fs.readFile(hookPath, 'utf-8');
      return content.includes(HOOK_MARKER);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Generates a CI job that fails when published pipelines are stale
   */
  generateCIScript(platform: CIPlatform = 'github', modulePath?: string): string {
    switch (platform) {
      case 'gitlab':
        return gitlabCIScript(modulePath);
      case 'github':
      default:
        return githubActionsScript(modulePath);
    }
  }
}
