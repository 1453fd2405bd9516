// CLI error handling utilities

import { PipelineKitError, ValidationError, LoadError, HookError } from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Validation Error: ${error.message}`;
  }

  if (error instanceof LoadError) {
    return `Load Error: ${error.message}`;
  }

  if (error instanceof HookError) {
    return error.details ? `Hook Error: ${error.message}\n  ${error.details}` : `Hook Error: ${error.message}`;
  }

  if (error instanceof PipelineKitError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error that aborted a command
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof PipelineKitError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n✗ ${formatError(error)}\n`);

  if (process.env.PIPELINE_KIT_DEBUG && error instanceof Error && error.stack) {
    console.error(error.stack);
  }

  process.exit(exitCodeFor(error));
}
