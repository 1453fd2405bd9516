// YAML serializer for pipelines

import { Document, Scalar } from 'yaml';
import { Pipeline, Stage, Job, Step } from '../../models/pipeline.js';

type Entry = [key: string, value: unknown];

/**
 * Serializes a pipeline to YAML.
 *
 * Keys are emitted in a fixed order and fields equal to their default are left out,
 * so the same object graph always renders to the same bytes.
 *
 * @param pipeline - The pipeline to serialize
 * @returns YAML document text ending with a newline
 */
export function serializePipeline(pipeline: Pipeline): string {
  const doc = new Document(serializePipelineNode(pipeline));
  return doc.toString({ lineWidth: 0 });
}

/**
 * Builds a plain object whose insertion order is the output key order, dropping undefined values
 */
function ordered(entries: Entry[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function literal(value: string): Scalar<string> {
  const scalar = new Scalar(value);
  scalar.type = Scalar.BLOCK_LITERAL;
  return scalar;
}

function serializePipelineNode(pipeline: Pipeline): Record<string, unknown> {
  return ordered([
    ['name', pipeline.name],
    ['trigger', pipeline.trigger ? { branches: pipeline.trigger.branches } : undefined],
    ['variables', pipeline.variables],
    ['stages', pipeline.stages.map(serializeStage)]
  ]);
}

function serializeStage(stage: Stage): Record<string, unknown> {
  return ordered([
    ['stage', stage.name],
    ['displayName', stage.displayName],
    ['dependsOn', stage.dependsOn],
    ['jobs', stage.jobs.map(serializeJob)]
  ]);
}

function serializeJob(job: Job): Record<string, unknown> {
  return ordered([
    ['job', job.name],
    ['displayName', job.displayName],
    ['pool', job.pool],
    ['dependsOn', job.dependsOn],
    ['timeoutInMinutes', job.timeoutInMinutes],
    ['steps', job.steps.map(serializeStep)]
  ]);
}

/**
 * Serializes a bash step. `continueOnError`, `failOnStderr` and `noProfile` default to false,
 * `enabled` and `noRc` default to true.
 */
export function serializeStep(step: Step): Record<string, unknown> {
  const script: Entry = step.kind === 'inline-bash'
    ? ['bash', literal(step.contents)]
    : ['bash', step.filePath];

  return ordered([
    script,
    ['displayName', step.displayName],
    ['name', step.name],
    ['condition', step.condition],
    ['continueOnError', step.continueOnError === true ? true : undefined],
    ['enabled', step.enabled === false ? false : undefined],
    ['timeoutInMinutes', step.timeoutInMinutes],
    ['env', step.env],
    ['arguments', step.kind === 'bash-file' ? step.arguments : undefined],
    ['workingDirectory', step.workingDirectory],
    ['failOnStderr', step.failOnStderr === true ? true : undefined],
    ['noProfile', step.noProfile === true ? true : undefined],
    ['noRc', step.noRc === false ? false : undefined]
  ]);
}
