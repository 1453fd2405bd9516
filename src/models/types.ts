// Core type definitions for pipeline-kit

/**
 * How a definition's `targetFile` is resolved to an absolute path
 */
export type TargetPathType = 'relativeToCurrentDir' | 'relativeToGitRoot' | 'absolute';

/**
 * Terminal state of one definition within a publish run
 */
export type PublishOutcome =
  | 'validation-failed'
  | 'created'
  | 'unchanged'
  | 'changed'
  | 'publish-error';

/**
 * Outcomes that mean the file on disk differed from what the definition renders
 */
export const DRIFT_OUTCOMES: readonly PublishOutcome[] = ['created', 'changed'];

/**
 * Outcomes that mean the definition could not be published
 */
export const ERROR_OUTCOMES: readonly PublishOutcome[] = ['validation-failed', 'publish-error'];

/**
 * Result recorded for a single definition
 */
export interface DefinitionResult {
  /** Class name of the definition */
  readonly name: string;
  /** Module-qualified name, `<module file>#<export name>` */
  readonly qualifiedName: string;
  readonly outcome: PublishOutcome;
  /** Absent when the path itself could not be resolved */
  readonly targetPath?: string;
  readonly error?: Error;
}

/**
 * Aggregate verdict for a whole publish run
 */
export interface RunResult {
  readonly success: boolean;
  readonly failOnChange: boolean;
  readonly results: readonly DefinitionResult[];
}

/**
 * Options accepted by a publish run
 */
export interface RunOptions {
  /** Treat `created` and `changed` outcomes as a failed run */
  failOnChange: boolean;
  /** Treat `validation-failed` and `publish-error` outcomes as a failed run */
  failOnError?: boolean;
}

export type OutcomeCounts = Record<PublishOutcome, number>;

/**
 * Counts results per outcome
 */
export function summarize(result: RunResult): OutcomeCounts {
  const counts: OutcomeCounts = {
    'validation-failed': 0,
    created: 0,
    unchanged: 0,
    changed: 0,
    'publish-error': 0
  };

  for (const { outcome } of result.results) {
    counts[outcome]++;
  }

  return counts;
}
