// Init command for pipeline-kit CLI

import { Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import { ConfigService, DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { DEFAULT_MODULE_PATH, PromptService, assertModulePath } from '../../services/prompt/index.js';
import { handleError } from '../utils/error-handler.js';

interface InitCommandOptions {
  module?: string;
  failIfChanged?: boolean;
  yes?: boolean;
  force?: boolean;
  configDir: string;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create the pipeline-kit configuration file')
    .option('-m, --module <path>', 'Compiled module containing the definitions')
    .option('--fail-if-changed', 'Fail publishing when generated files are out of date')
    .option('-y, --yes', 'Accept defaults instead of prompting')
    .option('-f, --force', 'Overwrite an existing configuration')
    .option('-c, --config-dir <dir>', 'Directory to write config.yaml into', DEFAULT_CONFIG_DIR)
    .action(async (options: InitCommandOptions) => {
      try {
        const configService = new ConfigService({ baseDir: options.configDir });

        if (await configService.configExists() && !options.force) {
          throw new ConfigError(
            `Configuration already exists at ${configService.getConfigPath()}. Use --force to overwrite it.`
          );
        }

        if (options.module !== undefined) {
          assertModulePath(options.module);
        }

        const answers = options.yes
          ? { module: options.module ?? DEFAULT_MODULE_PATH, failIfChanged: options.failIfChanged ?? false }
          : await new PromptService().promptForInit({
              module: options.module,
              failIfChanged: options.failIfChanged
            });

        await configService.saveConfig(answers);

        console.log(`✓ Wrote ${configService.getConfigPath()}`);
        console.log(`  module: ${answers.module}`);
        console.log(`  failIfChanged: ${answers.failIfChanged}`);
      } catch (error) {
        handleError(error);
      }
    });
}
