// Hooks commands for pipeline-kit CLI

import { Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import { CIPlatform, GitHooksService, HookName } from '../../services/hooks/index.js';
import { handleError } from '../utils/error-handler.js';

const HOOK_NAMES: readonly HookName[] = ['pre-commit', 'pre-push'];

function isHookName(value: string): value is HookName {
  return HOOK_NAMES.some(hook => hook === value);
}

function isPlatform(value: string): value is CIPlatform {
  return value === 'github' || value === 'gitlab';
}

function parseHooks(values: string[] | undefined): HookName[] | undefined {
  if (!values) {
    return undefined;
  }
  const unknown = values.filter(value => !isHookName(value));
  if (unknown.length > 0) {
    throw new ConfigError(`Unsupported hook(s): ${unknown.join(', ')}. Supported hooks: ${HOOK_NAMES.join(', ')}`);
  }
  return values.filter(isHookName);
}

/**
 * Registers the hooks command and subcommands
 *
 * Supports:
 * - pipeline-kit hooks install [--husky] [--hook <hooks...>] [--module <path>]
 * - pipeline-kit hooks uninstall
 * - pipeline-kit hooks ci [--platform github|gitlab]
 */
export function registerHooksCommand(program: Command): void {
  const hooksCommand = program
    .command('hooks')
    .description('Check published pipelines in git hooks and CI');

  hooksCommand
    .command('install')
    .description('Install git hooks that fail when published pipelines are out of date')
    .option('--husky', 'Write hooks into .husky instead of .git/hooks')
    .option('--hook <hooks...>', 'Hooks to install (pre-commit, pre-push)')
    .option('-m, --module <path>', 'Module argument passed to publish (defaults to config.yaml)')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: { husky?: boolean; hook?: string[]; module?: string; path: string }) => {
      try {
        const hooksService = new GitHooksService(options.path);

        console.log('Installing git hooks...');
        const written = await hooksService.install({
          husky: options.husky,
          hooks: parseHooks(options.hook),
          modulePath: options.module
        });

        for (const hookPath of written) {
          console.log(`✓ Installed ${hookPath}`);
        }
        console.log('\nPublished pipelines will be checked before each commit.');
      } catch (error) {
        handleError(error);
      }
    });

  hooksCommand
    .command('uninstall')
    .description('Remove hooks installed by pipeline-kit')
    .option('-p, --path <path>', 'Repository root', process.cwd())
    .action(async (options: { path: string }) => {
      try {
        const removed = await new GitHooksService(options.path).uninstall();

        if (removed.length === 0) {
          console.log('No pipeline-kit hooks found.');
          return;
        }
        for (const hookPath of removed) {
          console.log(`✓ Removed ${hookPath}`);
        }
      } catch (error) {
        handleError(error);
      }
    });

  hooksCommand
    .command('ci')
    .description('Print a CI job that fails when published pipelines are out of date')
    .option('--platform <platform>', 'CI platform (github or gitlab)', 'github')
    .option('-m, --module <path>', 'Module argument passed to publish (defaults to config.yaml)')
    .action((options: { platform: string; module?: string }) => {
      try {
        if (!isPlatform(options.platform)) {
          throw new ConfigError(`Unsupported CI platform '${options.platform}'. Supported platforms: github, gitlab`);
        }
        console.log(new GitHooksService().generateCIScript(options.platform, options.module));
      } catch (error) {
        handleError(error);
      }
    });
}
