// Zod schemas for pipeline definitions and configuration

import { z } from 'zod';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const IdentifierSchema = z.string().regex(IDENTIFIER, 'Must start with a letter or underscore and contain only letters, digits and underscores');

const TimeoutSchema = z.number().int('Must be a whole number of minutes').nonnegative();

/**
 * Fields shared by all steps
 */
const StepBaseSchema = z.object({
  displayName: z.string().min(1).optional(),
  name: IdentifierSchema.optional(),
  condition: z.string().min(1).optional(),
  continueOnError: z.boolean().optional(),
  enabled: z.boolean().optional(),
  timeoutInMinutes: TimeoutSchema.optional(),
  env: z.record(z.string()).optional(),
  workingDirectory: z.string().min(1).optional(),
  failOnStderr: z.boolean().optional(),
  noProfile: z.boolean().optional(),
  noRc: z.boolean().optional()
});

export const InlineBashStepSchema = StepBaseSchema.extend({
  kind: z.literal('inline-bash'),
  contents: z.string().refine(s => s.trim().length > 0, 'Inline script cannot be empty')
});

export const BashFileStepSchema = StepBaseSchema.extend({
  kind: z.literal('bash-file'),
  filePath: z.string().min(1, 'Script path is required'),
  arguments: z.string().optional()
});

export const StepSchema = z.discriminatedUnion('kind', [
  InlineBashStepSchema,
  BashFileStepSchema
]);

export const JobSchema = z.object({
  name: IdentifierSchema,
  displayName: z.string().min(1).optional(),
  pool: z.string().min(1).optional(),
  dependsOn: z.array(IdentifierSchema).optional(),
  timeoutInMinutes: TimeoutSchema.optional(),
  steps: z.array(StepSchema).min(1, 'A job needs at least one step')
});

export const StageSchema = z.object({
  name: IdentifierSchema,
  displayName: z.string().min(1).optional(),
  dependsOn: z.array(IdentifierSchema).optional(),
  jobs: z.array(JobSchema).min(1, 'A stage needs at least one job')
});

export const PipelineSchema = z.object({
  name: z.string().min(1).optional(),
  trigger: z.object({
    branches: z.array(z.string().min(1)).min(1, 'A trigger needs at least one branch')
  }).optional(),
  variables: z.record(z.string()).optional(),
  stages: z.array(StageSchema).min(1, 'A pipeline needs at least one stage')
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Shape of .pipeline-kit/config.yaml
 */
export const ConfigSchema = z.object({
  module: z.string().min(1).optional(),
  failIfChanged: z.boolean().optional(),
  failOnError: z.boolean().optional(),
  dependencies: z.array(z.string().min(1)).optional(),
  logLevel: LogLevelSchema.optional()
}).strict();

export type ValidatedConfig = z.infer<typeof ConfigSchema>;

/**
 * Flattens zod issues into `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
