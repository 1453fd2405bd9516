// Publish command for pipeline-kit CLI

import { Command } from 'commander';
import { logger } from '../../core/logger.js';
import { DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { PublishService, PublishWatcher, WorkerPublishCycle } from '../../services/publish/index.js';
import { handleError } from '../utils/error-handler.js';
import { ModuleCommandOptions, prepareRun } from '../utils/run-context.js';

interface PublishCommandOptions extends ModuleCommandOptions {
  watch?: boolean;
}

/**
 * Registers the publish command
 *
 * Supports:
 * - pipeline-kit publish [module] [--fail-if-changed] [--fail-on-error]
 * - pipeline-kit publish [module] --watch
 */
export function registerPublishCommand(program: Command): void {
  program
    .command('publish')
    .description('Validate pipeline definitions and write them to their target files')
    .argument('[module]', 'Compiled module containing the definitions (defaults to "module" in config.yaml)')
    .option('--fail-if-changed', 'Fail when a published file was created or changed')
    .option('--fail-on-error', 'Fail when a definition fails validation or publishing')
    .option('-d, --dependency <names...>', 'Packages that must be installed next to the module')
    .option('-w, --watch', 'Publish again whenever the module is rebuilt')
    .option('-c, --config-dir <dir>', 'Directory holding config.yaml', DEFAULT_CONFIG_DIR)
    .option('-v, --verbose', 'Show exception details')
    .option('-q, --quiet', 'Only show warnings and errors')
    .action(async (moduleArg: string | undefined, options: PublishCommandOptions) => {
      try {
        const { settings, loader } = await prepareRun(moduleArg, options);
        const runOptions = { failOnChange: settings.failIfChanged, failOnError: settings.failOnError };

        if (options.watch) {
          const watcher = new PublishWatcher(new WorkerPublishCycle({
            modulePath: loader.config.modulePath,
            dependencies: [...loader.config.dependencies],
            options: runOptions,
            logLevel: settings.logLevel
          }));
          watcher.start();
          watcher.trigger();
          logger.info(`Watching ${watcher.watchRoot} for changes. Press Ctrl+C to stop.`);

          process.once('SIGINT', () => {
            watcher.stop().then(() => process.exit(0), handleError);
          });
          return;
        }

        const result = await new PublishService().run(await loader.load(), runOptions);
        if (!result.success) {
          process.exit(1);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
