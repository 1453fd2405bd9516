// Definition of a single CI/CD pipeline rendered to YAML

import { ValidationError } from '../core/errors.js';
import { ABSTRACT_DEFINITION, DEFINITION_CONTRACT } from '../models/definition.js';
import { Pipeline } from '../models/pipeline.js';
import { serializePipeline } from '../services/serialization/serializer.js';
import { PipelineValidator } from '../services/validation/validator.js';
import { DefinitionBase } from './definition-base.js';

const validator = new PipelineValidator();

/**
 * Extend this class and export it from your definitions module:
 *
 * ```ts
 * export class CiPipeline extends PipelineDefinition {
 *   readonly targetFile = '.ci/pipeline.yml';
 *   get pipeline(): Pipeline {
 *     return { stages: [{ name: 'Build', jobs: [{ name: 'Test', steps: [Bash.inline('npm test')] }] }] };
 *   }
 * }
 * ```
 *
 * TypeScript's `abstract` keyword is erased at run time. A shared base class that
 * should not be published itself needs `static readonly [ABSTRACT_DEFINITION] = true`,
 * otherwise it is instantiated like any other definition.
 */
export abstract class PipelineDefinition extends DefinitionBase {
  static readonly [DEFINITION_CONTRACT]: string = 'pipeline-kit.PipelineDefinition';
  static readonly [ABSTRACT_DEFINITION]: boolean = true;

  abstract readonly pipeline: Pipeline;

  validate(): void {
    const result = validator.validate(this.pipeline);
    if (!result.valid) {
      throw new ValidationError(
        `Pipeline ${this.constructor.name} is invalid`,
        result.errors.map(e => `${e.field}: ${e.message}`)
      );
    }
  }

  serialize(): string {
    return serializePipeline(this.pipeline);
  }
}
