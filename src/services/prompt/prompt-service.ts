/**
 * Interactive Prompt Service
 *
 * Asks for the settings `pipeline-kit init` needs when they were not given as flags.
 */

import inquirer from 'inquirer';
import { ConfigError } from '../../core/errors.js';

/**
 * Values written to config.yaml by `init`
 */
export interface InitAnswers {
  module: string;
  failIfChanged: boolean;
}

export const DEFAULT_MODULE_PATH = 'dist/pipelines.js';

export function validateModulePath(input: string): boolean | string {
  const trimmed = input.trim();
  if (trimmed === '') {
    return 'Module path is required';
  }
  if (!/\.(m?js|cjs)$/.test(trimmed)) {
    return 'Point at the compiled JavaScript module (.js, .mjs or .cjs)';
  }
  return true;
}

/**
 * @throws ConfigError with the reason `validateModulePath` gives
 */
export function assertModulePath(input: string): void {
  const check = validateModulePath(input);
  if (typeof check === 'string') {
    throw new ConfigError(check);
  }
}

/**
 * Prompt Service Interface
 */
export interface IPromptService {
  isInteractive(): boolean;
  promptForInit(provided: Partial<InitAnswers>): Promise<InitAnswers>;
}

export class PromptService implements IPromptService {
  isInteractive(): boolean {
    return Boolean(process.stdin.isTTY && process.stdout.isTTY);
  }

  /**
   * Prompts only for values missing from `provided`
   *
   * @throws ConfigError if something is missing and the terminal is not interactive
   */
  async promptForInit(provided: Partial<InitAnswers>): Promise<InitAnswers> {
    if (provided.module !== undefined && provided.failIfChanged !== undefined) {
      return { module: provided.module, failIfChanged: provided.failIfChanged };
    }

    if (!this.isInteractive()) {
      const missing = (['module', 'failIfChanged'] as const).filter(field => provided[field] === undefined);
      throw new ConfigError(
        `Interactive mode required but terminal does not support TTY input.\n` +
        `Missing settings: ${missing.join(', ')}\n` +
        `Provide them with --module and --fail-if-changed, or pass --yes to accept defaults.`
      );
    }

    const answers = await inquirer.prompt<InitAnswers>([
      {
        type: 'input',
        name: 'module',
        message: 'Compiled module containing your pipeline definitions:',
        default: DEFAULT_MODULE_PATH,
        when: () => provided.module === undefined,
        validate: (input: string) => validateModulePath(input)
      },
      {
        type: 'confirm',
        name: 'failIfChanged',
        message: 'Fail when published files are out of date (recommended for CI)?',
        default: false,
        when: () => provided.failIfChanged === undefined
      }
    ]);

    return {
      module: (provided.module ?? answers.module).trim(),
      failIfChanged: provided.failIfChanged ?? answers.failIfChanged
    };
  }
}
