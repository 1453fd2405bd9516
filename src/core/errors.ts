// Domain-specific error types for pipeline-kit

/**
 * Base error class for all pipeline-kit errors
 */
export abstract class PipelineKitError extends Error {
  abstract readonly code: string;
  /** Process exit code the CLI uses when this error aborts a command */
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Missing or invalid configuration (CLI options or config.yaml)
 */
export class ConfigError extends PipelineKitError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 2;
}

/**
 * The compiled module or one of its auxiliary dependencies could not be loaded
 */
export class LoadError extends PipelineKitError {
  readonly code = 'LOAD_ERROR';
  readonly exitCode = 3;

  constructor(message: string, public readonly modulePath: string, public readonly dependency?: string) {
    super(message, { modulePath, dependency });
  }
}

/**
 * A definition type was found but could not be turned into an instance
 */
export class DiscoveryError extends PipelineKitError {
  readonly code = 'DISCOVERY_ERROR';
  readonly exitCode = 4;

  constructor(message: string, public readonly typeName?: string) {
    super(message, { typeName });
  }
}

/**
 * A definition's configuration is invalid
 */
export class ValidationError extends PipelineKitError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 5;

  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message, { issues });
  }
}

/**
 * A definition's target file could not be resolved to a usable path
 */
export class TargetPathError extends PipelineKitError {
  readonly code = 'TARGET_PATH_ERROR';
  readonly exitCode = 6;
}

/**
 * Git hook installation problems
 */
export class HookError extends PipelineKitError {
  readonly code = 'HOOK_ERROR';
  readonly exitCode = 7;

  constructor(message: string, public readonly details?: string) {
    super(message, { details });
  }
}

/**
 * Extracts a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps non-Error throwables so callers can keep a stack-bearing value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
