// List command for pipeline-kit CLI

import { Command } from 'commander';
import { DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { describeDefinitionTypes } from '../../services/discovery/index.js';
import { handleError } from '../utils/error-handler.js';
import { ModuleCommandOptions, prepareRun } from '../utils/run-context.js';

interface ListCommandOptions extends ModuleCommandOptions {
  json?: boolean;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the pipeline definition types found in a module')
    .argument('[module]', 'Compiled module containing the definitions (defaults to "module" in config.yaml)')
    .option('-d, --dependency <names...>', 'Packages that must be installed next to the module')
    .option('-c, --config-dir <dir>', 'Directory holding config.yaml', DEFAULT_CONFIG_DIR)
    .option('--json', 'Print the definition types as JSON')
    .action(async (moduleArg: string | undefined, options: ListCommandOptions) => {
      try {
        const { loader } = await prepareRun(moduleArg, options);
        const types = describeDefinitionTypes(await loader.load());

        if (options.json) {
          console.log(JSON.stringify(types, null, 2));
          return;
        }

        if (types.length === 0) {
          console.log('No pipeline definitions found.');
          return;
        }

        for (const type of types) {
          console.log(`${type.name}  ${type.qualifiedName}  ${type.isConcrete ? 'concrete' : 'abstract'}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
