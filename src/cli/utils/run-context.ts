// Shared setup for commands that load a definitions module

import { ConfigError } from '../../core/errors.js';
import { Logger, LogLevelName, parseLogLevel } from '../../core/logger.js';
import { ConfigService, RunSettings } from '../../services/config/config-service.js';
import { ModuleLoader, createLoaderConfig } from '../../services/loader/module-loader.js';

/**
 * Options every module-loading command accepts
 */
export interface ModuleCommandOptions {
  configDir: string;
  dependency?: string[];
  verbose?: boolean;
  quiet?: boolean;
  failIfChanged?: boolean;
  failOnError?: boolean;
}

export interface RunContext {
  settings: RunSettings;
  loader: ModuleLoader;
}

function verbosity(options: ModuleCommandOptions): LogLevelName | undefined {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'warn';
  return undefined;
}

/**
 * Resolves settings, configures logging and builds the module loader
 *
 * @throws ConfigError when no module path is given anywhere
 */
export async function prepareRun(
  moduleArg: string | undefined,
  options: ModuleCommandOptions
): Promise<RunContext> {
  const configService = new ConfigService({ baseDir: options.configDir });
  const settings = await configService.resolveSettings({
    module: moduleArg,
    failIfChanged: options.failIfChanged,
    failOnError: options.failOnError,
    dependencies: options.dependency,
    logLevel: verbosity(options)
  });

  Logger.configure({ level: parseLogLevel(settings.logLevel) });

  if (!settings.module) {
    throw new ConfigError(
      `No module to scan. Pass it as an argument or set "module" in ${configService.getConfigPath()}`
    );
  }

  const loader = new ModuleLoader(createLoaderConfig(settings.module, {
    dependencies: settings.dependencies
  }));

  return { settings, loader };
}
