/**
 * Publish Service
 *
 * Drives one publish run: discovers definitions, then validates, publishes and
 * classifies each of them in turn. Definitions are handled strictly one after another.
 */

import { errorMessage, toError } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { isDefinitionDescriptor } from '../../models/definition.js';
import {
  DefinitionResult,
  DRIFT_OUTCOMES,
  ERROR_OUTCOMES,
  PublishOutcome,
  RunOptions,
  RunResult,
  summarize
} from '../../models/types.js';
import { DiscoveredDefinition, DiscoveryService } from '../discovery/discovery-service.js';
import { classifyChange, fingerprintFile } from '../drift/change-detector.js';
import { TypeCatalog } from '../loader/module-loader.js';

const VERBOSE_HINT = 'To see exception details, run with --verbose';

/**
 * Outcome of validating a definition without publishing it
 */
export interface ValidationReport {
  name: string;
  qualifiedName: string;
  valid: boolean;
  error?: Error;
}

export interface PublishServiceOptions {
  discovery?: DiscoveryService;
  logger?: Logger;
}

/**
 * Publish Service Interface
 */
export interface IPublishService {
  run(catalog: TypeCatalog, options: RunOptions): Promise<RunResult>;
  validate(catalog: TypeCatalog): Promise<ValidationReport[]>;
}

export class PublishService implements IPublishService {
  private discovery: DiscoveryService;
  private log: Logger;

  constructor(options: PublishServiceOptions = {}) {
    this.discovery = options.discovery ?? new DiscoveryService();
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Publishes every definition in the catalog.
   *
   * Discovery failures propagate. Failures of a single definition are recorded
   * in its result and never stop the others.
   */
  async run(catalog: TypeCatalog, options: RunOptions): Promise<RunResult> {
    const definitions = this.discovery.discover(catalog);

    if (definitions.length === 0) {
      this.log.error(`No pipeline definitions found in ${catalog.moduleId}`);
      return { success: false, failOnChange: options.failOnChange, results: [] };
    }

    const results: DefinitionResult[] = [];
    for (const definition of definitions) {
      results.push(await this.publishDefinition(definition, options));
    }

    const result: RunResult = {
      success: this.isSuccessful(results, options),
      failOnChange: options.failOnChange,
      results
    };

    this.logSummary(result, options);
    return result;
  }

  /**
   * Validates every definition in the catalog without writing anything
   */
  async validate(catalog: TypeCatalog): Promise<ValidationReport[]> {
    const reports: ValidationReport[] = [];

    for (const { type, instance } of this.discovery.discover(catalog)) {
      const report = { name: type.name, qualifiedName: type.qualifiedName };

      if (!isDefinitionDescriptor(instance)) {
        const error = new Error(`Failed to get pipeline definition metadata for ${type.qualifiedName}`);
        this.log.error(error.message);
        reports.push({ ...report, valid: false, error });
        continue;
      }

      try {
        await instance.validate();
        this.log.info(`${type.name}: valid`);
        reports.push({ ...report, valid: true });
      } catch (error) {
        this.logFailure(`Validation of pipeline ${type.name} failed`, error);
        reports.push({ ...report, valid: false, error: toError(error) });
      }
    }

    return reports;
  }

  private async publishDefinition(
    { type, instance }: DiscoveredDefinition,
    options: RunOptions
  ): Promise<DefinitionResult> {
    const { name, qualifiedName } = type;
    const fail = (outcome: PublishOutcome, error: unknown, targetPath?: string): DefinitionResult =>
      Object.freeze({ name, qualifiedName, outcome, targetPath, error: toError(error) });

    if (!isDefinitionDescriptor(instance)) {
      const message = `Failed to get pipeline definition metadata for ${qualifiedName}`;
      this.log.error(message);
      return fail('publish-error', message);
    }

    this.log.info(`${name}:`);

    let targetPath: string;
    try {
      const resolved: unknown = await instance.getTargetPath();
      if (typeof resolved !== 'string' || resolved.trim() === '') {
        throw new Error(`Target path of ${name} is empty`);
      }
      targetPath = resolved;
    } catch (error) {
      this.logFailure(`Failed to get target path for ${name}`, error);
      return fail('publish-error', error);
    }

    this.log.info('  Validating pipeline...');
    try {
      await instance.validate();
    } catch (error) {
      this.logFailure(`Validation of pipeline ${name} failed`, error);
      return fail('validation-failed', error, targetPath);
    }

    let outcome: PublishOutcome;
    try {
      const before = await fingerprintFile(targetPath);
      await instance.publish();
      const after = await fingerprintFile(targetPath);

      if (after === null) {
        throw new Error(`Publishing ${name} did not produce ${targetPath}`);
      }
      outcome = classifyChange(before, after);
    } catch (error) {
      this.logFailure(`Publishing of pipeline ${name} failed`, error);
      return fail('publish-error', error, targetPath);
    }

    this.logOutcome(name, targetPath, outcome, options.failOnChange);
    return Object.freeze({ name, qualifiedName, outcome, targetPath });
  }

  private logOutcome(name: string, targetPath: string, outcome: PublishOutcome, failOnChange: boolean): void {
    switch (outcome) {
      case 'created':
        if (failOnChange) {
          this.log.error('  This pipeline hasn\'t been published yet!');
        } else {
          this.log.info(`  ${name} created at ${targetPath}`);
        }
        break;
      case 'unchanged':
        this.log.info('  No new changes to publish');
        break;
      case 'changed':
        if (failOnChange) {
          this.log.error(`  Changes detected between ${name} and ${targetPath}!`);
        } else {
          this.log.info(`  Published new changes to ${targetPath}`);
        }
        break;
      default:
        break;
    }
  }

  /**
   * One-line message at the default level, full stack only at debug
   */
  private logFailure(message: string, error: unknown): void {
    this.log.error(`${message}: ${errorMessage(error)}`);
    this.log.error(VERBOSE_HINT);
    const stack = toError(error).stack;
    if (stack) {
      this.log.debug(stack);
    }
  }

  private isSuccessful(results: DefinitionResult[], options: RunOptions): boolean {
    const drifted = results.some(r => DRIFT_OUTCOMES.includes(r.outcome));
    const failed = results.some(r => ERROR_OUTCOMES.includes(r.outcome));

    if (options.failOnChange && drifted) {
      return false;
    }
    return !(options.failOnError && failed);
  }

  private logSummary(result: RunResult, options: RunOptions): void {
    const counts = summarize(result);
    this.log.info(
      `Published ${result.results.length} definition(s): ${counts.created} created, ${counts.changed} changed, ` +
      `${counts.unchanged} unchanged, ${counts['validation-failed']} failed validation, ${counts['publish-error']} errored`
    );

    if (options.failOnChange && !result.success && result.results.some(r => DRIFT_OUTCOMES.includes(r.outcome))) {
      this.log.error('Generated files were out of date. Commit the published files and run again.');
    }
  }
}
