// Vendor-neutral pipeline object model rendered by PipelineDefinition

/**
 * Fields every step accepts
 */
export interface StepBase {
  displayName?: string;
  /** Identifier other steps can reference */
  name?: string;
  condition?: string;
  continueOnError?: boolean;
  enabled?: boolean;
  timeoutInMinutes?: number;
  env?: Record<string, string>;
}

/**
 * Options shared by both bash step flavours
 */
export interface BashOptions {
  /** Defaults to the sources directory of the run */
  workingDirectory?: string;
  /** Fail the step when anything is written to stderr. Default `false` */
  failOnStderr?: boolean;
  /** Skip `/etc/profile` and personal initialization files. Default `false` */
  noProfile?: boolean;
  /** Skip `~/.bashrc`. Default `true` */
  noRc?: boolean;
}

/**
 * Script passed inline, rendered as a literal block
 */
export interface InlineBashStep extends StepBase, BashOptions {
  kind: 'inline-bash';
  contents: string;
}

/**
 * Script file checked into the repository
 */
export interface BashFileStep extends StepBase, BashOptions {
  kind: 'bash-file';
  /** Absolute, or relative to the default working directory */
  filePath: string;
  arguments?: string;
}

export type Step = InlineBashStep | BashFileStep;

export interface Job {
  name: string;
  displayName?: string;
  /** Agent pool or runner label */
  pool?: string;
  dependsOn?: string[];
  timeoutInMinutes?: number;
  steps: Step[];
}

export interface Stage {
  name: string;
  displayName?: string;
  dependsOn?: string[];
  jobs: Job[];
}

export interface Trigger {
  branches: string[];
}

export interface Pipeline {
  name?: string;
  trigger?: Trigger;
  variables?: Record<string, string>;
  stages: Stage[];
}
