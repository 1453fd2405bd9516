// One watch-mode publish run, isolated on its own worker thread

import { Worker } from 'worker_threads';
import { z } from 'zod';
import { LoadError, toError } from '../../core/errors.js';
import { LogLevelSchema } from '../../core/schemas.js';
import { RunResult } from '../../models/types.js';

/**
 * Everything a worker needs to load the module and publish it
 */
export const PublishJobSchema = z.object({
  modulePath: z.string().min(1),
  dependencies: z.array(z.string().min(1)),
  options: z.object({
    failOnChange: z.boolean(),
    failOnError: z.boolean().optional()
  }),
  logLevel: LogLevelSchema
});

export type PublishJob = z.infer<typeof PublishJobSchema>;

/**
 * A repeatable publish of one module
 */
export interface PublishCycle {
  readonly modulePath: string;
  run(): Promise<RunResult>;
}

function isRunResult(value: unknown): value is RunResult {
  return typeof value === 'object' && value !== null &&
    'success' in value && typeof value.success === 'boolean' &&
    'failOnChange' in value && typeof value.failOnChange === 'boolean' &&
    'results' in value && Array.isArray(value.results);
}

/**
 * Runs each publish on a new worker thread. Every worker starts with an empty
 * module cache, so the entry module and everything it imports are read from disk again.
 */
export class WorkerPublishCycle implements PublishCycle {
  constructor(
    private readonly job: PublishJob,
    private readonly script: URL = new URL('./publish-worker.js', import.meta.url)
  ) {}

  get modulePath(): string {
    return this.job.modulePath;
  }

  run(): Promise<RunResult> {
    const { modulePath } = this.job;

    return new Promise<RunResult>((resolve, reject) => {
      const worker = new Worker(this.script, { workerData: this.job });

      worker.once('message', (message: unknown) => {
        if (isRunResult(message)) {
          resolve(message);
        } else {
          reject(new LoadError(`Publish worker for ${modulePath} sent an unexpected message`, modulePath));
        }
      });
      worker.once('error', error => reject(toError(error)));
      worker.once('exit', code => {
        reject(new LoadError(`Publish worker for ${modulePath} exited with code ${code} without a result`, modulePath));
      });
    });
  }
}
