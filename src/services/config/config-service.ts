/**
 * Configuration Service
 *
 * Loads .pipeline-kit/config.yaml and merges it with command-line overrides.
 * A missing file is an empty configuration; a malformed one is a ConfigError.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { LogLevelName } from '../../core/logger.js';
import { ConfigSchema, ValidatedConfig, formatIssues } from '../../core/schemas.js';
import { DEFAULT_DEPENDENCIES } from '../loader/module-loader.js';

export const DEFAULT_CONFIG_DIR = '.pipeline-kit';
export const CONFIG_FILE = 'config.yaml';

export type PipelineKitConfig = ValidatedConfig;

/**
 * Values given on the command line; undefined means "not given"
 */
export interface ConfigOverrides {
  module?: string;
  failIfChanged?: boolean;
  failOnError?: boolean;
  dependencies?: string[];
  logLevel?: LogLevelName;
}

/**
 * Fully resolved settings for one run
 */
export interface RunSettings {
  module: string | undefined;
  failIfChanged: boolean;
  failOnError: boolean;
  dependencies: readonly string[];
  logLevel: LogLevelName;
}

export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: PipelineKitConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || DEFAULT_CONFIG_DIR;
    this.configPath = path.join(this.baseDir, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ConfigError when the file exists but is not valid YAML or does not match the schema
   */
  async loadConfig(): Promise<PipelineKitConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw new ConfigError(`Failed to read ${this.configPath}: ${err.message}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigError(`${this.configPath} is not valid YAML: ${errorMessage(error)}`);
    }

    const result = ConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration in ${this.configPath}:\n${formatIssues(result.error).map(i => `  - ${i}`).join('\n')}`,
        { issues: formatIssues(result.error) }
      );
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Command-line values win over config.yaml, which wins over defaults
   */
  async resolveSettings(overrides: ConfigOverrides = {}): Promise<RunSettings> {
    const config = await this.loadConfig();

    return {
      module: overrides.module ?? config.module,
      failIfChanged: overrides.failIfChanged ?? config.failIfChanged ?? false,
      failOnError: overrides.failOnError ?? config.failOnError ?? false,
      dependencies: overrides.dependencies ?? config.dependencies ?? DEFAULT_DEPENDENCIES,
      logLevel: overrides.logLevel ?? config.logLevel ?? 'info'
    };
  }

  async saveConfig(config: PipelineKitConfig): Promise<void> {
    const result = ConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigError(`Refusing to save invalid configuration: ${formatIssues(result.error).join('; ')}`);
    }

    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(result.data), 'utf-8');
    this.cachedConfig = result.data;
  }

  async configExists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }
}
