/**
 * Tests for Git Hooks Service
 *
 * git itself is replaced by a stub so the tests only touch a temporary directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import { GitHooksService, HOOK_MARKER, hookScript, publishCommand } from './hooks-service.js';
import { HookError } from '../../core/errors.js';

const { revparse } = vi.hoisted(() => ({ revparse: vi.fn() }));

vi.mock('simple-git', () => ({
  simpleGit: () => ({ revparse })
}));

let testCounter = 0;
function getTestDir(): string {
  return `.pipeline-kit-test-hooks-${process.pid}-${++testCounter}`;
}

describe('GitHooksService', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = getTestDir();
    await fs.mkdir(testDir, { recursive: true });
    revparse.mockReset();
    revparse.mockResolvedValue('.git\n');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('publishCommand - unit tests', () => {
    it('should run publish in strict mode without a module', () => {
      expect(publishCommand()).toBe('npx pipeline-kit publish --fail-if-changed');
    });

    it('should quote the module path', () => {
      expect(publishCommand('dist/my pipelines.js'))
        .toBe('npx pipeline-kit publish "dist/my pipelines.js" --fail-if-changed');
    });
  });

  describe('hookScript - unit tests', () => {
    it('should start with a plain shell shebang', () => {
      const script = hookScript('pre-commit');

      expect(script.split('\n')[0]).toBe('#!/bin/sh');
      expect(script.split('\n')[1]).toBe(`${HOOK_MARKER} (pre-commit)`);
    });

    it('should source husky when written for husky', () => {
      const lines = hookScript('pre-push', undefined, true).split('\n');

      expect(lines[0]).toBe('#!/usr/bin/env sh');
      expect(lines[1]).toBe('. "$(dirname -- "$0")/_/husky.sh"');
      expect(lines[2]).toBe(`${HOOK_MARKER} (pre-push)`);
    });

    it('should always carry the marker and the publish command', () => {
      fc.assert(
        fc.property(
          fc.constantFrom<'pre-commit' | 'pre-push'>('pre-commit', 'pre-push'),
          fc.option(fc.stringMatching(/^[a-z][a-z0-9/]{0,15}\.js$/), { nil: undefined }),
          fc.boolean(),
          (hook, modulePath, husky) => {
            const script = hookScript(hook, modulePath, husky);
            expect(script).toContain(HOOK_MARKER);
            expect(script).toContain(publishCommand(modulePath));
          }
        )
      );
    });
  });

  describe('install - unit tests', () => {
    it('should write an executable pre-commit hook into .git/hooks', async () => {
      const service = new GitHooksService(testDir);

      const written = await service.install();

      const hookPath = path.resolve(testDir, '.git', 'hooks', 'pre-commit');
      expect(written).toEqual([hookPath]);
      expect(await fs.readFile(hookPath, 'utf-8')).toBe(hookScript('pre-commit'));
      if (process.platform !== 'win32') {
        const stat = await fs.stat(hookPath);
        expect(stat.mode & 0o111).not.toBe(0);
      }
    });

    it('should install every requested hook', async () => {
      const written = await new GitHooksService(testDir).install({
        hooks: ['pre-commit', 'pre-push'],
        modulePath: 'dist/pipelines.js'
      });

      expect(written.map(p => path.basename(p))).toEqual(['pre-commit', 'pre-push']);
      expect(await fs.readFile(written[1], 'utf-8')).toContain('"dist/pipelines.js"');
    });

    it('should fail outside a git repository', async () => {
      revparse.mockRejectedValue(new Error('fatal: not a git repository'));

      await expect(new GitHooksService(testDir).install()).rejects.toThrow(HookError);
    });

    it('should fail when husky is requested but not set up', async () => {
      await expect(new GitHooksService(testDir).install({ husky: true }))
        .rejects.toThrow('Husky is not installed');
    });

    it('should write into .husky when husky is set up', async () => {
      await fs.mkdir(path.join(testDir, '.husky'));

      const written = await new GitHooksService(testDir).install({ husky: true });

      expect(written).toEqual([path.join(testDir, '.husky', 'pre-commit')]);
    });
  });

  describe('uninstall - unit tests', () => {
    it('should remove installed hooks and leave foreign hooks alone', async () => {
      const service = new GitHooksService(testDir);
      const [installed] = await service.install();
      const foreign = path.resolve(testDir, '.git', 'hooks', 'pre-push');
      await fs.writeFile(foreign, '#!/bin/sh\nnpm run lint\n');

      const removed = await service.uninstall();

      expect(removed).toEqual([installed]);
      await expect(fs.access(installed)).rejects.toThrow();
      expect(await fs.readFile(foreign, 'utf-8')).toBe('#!/bin/sh\nnpm run lint\n');
    });

    it('should report nothing when no hooks are installed', async () => {
      expect(await new GitHooksService(testDir).uninstall()).toEqual([]);
    });
  });

  describe('generateCIScript - unit tests', () => {
    it('should default to GitHub Actions', () => {
      const script = new GitHooksService(testDir).generateCIScript();

      expect(script.split('\n')[0]).toBe('name: Validate published pipelines');
      expect(script).toContain('        run: npx pipeline-kit publish --fail-if-changed\n');
    });

    it('should generate a GitLab CI job', () => {
      const script = new GitHooksService(testDir).generateCIScript('gitlab', 'dist/p.js');

      expect(script).toContain('validate-pipelines:\n  stage: validate\n');
      expect(script).toContain('    - npx pipeline-kit publish "dist/p.js" --fail-if-changed\n');
    });
  });
});
