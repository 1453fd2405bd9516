// Validate command for pipeline-kit CLI

import { Command } from 'commander';
import { logger } from '../../core/logger.js';
import { DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { PublishService } from '../../services/publish/index.js';
import { handleError } from '../utils/error-handler.js';
import { ModuleCommandOptions, prepareRun } from '../utils/run-context.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate every pipeline definition without writing any file')
    .argument('[module]', 'Compiled module containing the definitions (defaults to "module" in config.yaml)')
    .option('-d, --dependency <names...>', 'Packages that must be installed next to the module')
    .option('-c, --config-dir <dir>', 'Directory holding config.yaml', DEFAULT_CONFIG_DIR)
    .option('-v, --verbose', 'Show exception details')
    .option('-q, --quiet', 'Only show warnings and errors')
    .action(async (moduleArg: string | undefined, options: ModuleCommandOptions) => {
      try {
        const { loader } = await prepareRun(moduleArg, options);
        const reports = await new PublishService().validate(await loader.load());
        const invalid = reports.filter(report => !report.valid);

        if (reports.length === 0) {
          logger.error(`No pipeline definitions found in ${loader.config.modulePath}`);
          process.exit(1);
        }

        if (invalid.length > 0) {
          logger.error(`${invalid.length} of ${reports.length} definition(s) failed validation`);
          process.exit(1);
        }

        logger.info(`All ${reports.length} definition(s) are valid`);
      } catch (error) {
        handleError(error);
      }
    });
}
