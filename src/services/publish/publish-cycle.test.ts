/**
 * Tests for worker-thread publish cycles
 *
 * The worker scripts here are small .mjs fixtures standing in for the compiled
 * publish worker; they import the entry module the same way it does.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { PublishJob, PublishJobSchema, WorkerPublishCycle } from './publish-cycle.js';
import { LoadError } from '../../core/errors.js';

let testCounter = 0;

const REPORTING_WORKER = `
import { parentPort, workerData } from 'node:worker_threads';
import { pathToFileURL } from 'node:url';

const { Build } = await import(pathToFileURL(workerData.modulePath).href);
parentPort.postMessage({
  success: true,
  failOnChange: workerData.options.failOnChange,
  results: [{ name: Build.version, qualifiedName: 'entry.mjs#Build', outcome: 'unchanged' }]
});
`;

describe('WorkerPublishCycle', () => {
  let testDir: string;
  let job: PublishJob;

  async function writeFile(name: string, source: string): Promise<string> {
    const filePath = path.join(testDir, name);
    await fs.writeFile(filePath, source, 'utf-8');
    return filePath;
  }

  async function cycleWith(workerSource: string): Promise<WorkerPublishCycle> {
    const script = await writeFile('worker.mjs', workerSource);
    return new WorkerPublishCycle(job, pathToFileURL(script));
  }

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `pipeline-kit-test-cycle-${process.pid}-${++testCounter}`);
    await fs.mkdir(testDir, { recursive: true });
    job = {
      modulePath: path.join(testDir, 'entry.mjs'),
      dependencies: [],
      options: { failOnChange: true },
      logLevel: 'info'
    };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('run - unit tests', () => {
    it('should pick up a rebuilt module imported by the entry', async () => {
      await writeFile('entry.mjs', `export { Build } from './build.mjs';\n`);
      await writeFile('build.mjs', `export class Build { static version = 'v1'; }\n`);
      const cycle = await cycleWith(REPORTING_WORKER);

      const first = await cycle.run();
      await writeFile('build.mjs', `export class Build { static version = 'v2'; }\n`);
      const second = await cycle.run();

      expect(first.results[0].name).toBe('v1');
      expect(second.results[0].name).toBe('v2');
      expect(second.failOnChange).toBe(true);
    });

    it('should reject with the error thrown in the worker', async () => {
      const cycle = await cycleWith(`throw new Error('Module not found: entry.mjs');\n`);

      await expect(cycle.run()).rejects.toThrow('Module not found: entry.mjs');
    });

    it('should reject a worker that exits without a result', async () => {
      const cycle = await cycleWith(`process.exitCode = 0;\n`);

      await expect(cycle.run()).rejects.toThrow(LoadError);
    });

    it('should reject a message that is not a run result', async () => {
      const cycle = await cycleWith(`
import { parentPort } from 'node:worker_threads';
parentPort.postMessage({ success: 'yes' });
`);

      await expect(cycle.run()).rejects.toThrow(
        `Publish worker for ${job.modulePath} sent an unexpected message`
      );
    });
  });

  describe('PublishJobSchema - unit tests', () => {
    it('should reject an unknown log level', () => {
      expect(PublishJobSchema.safeParse({ ...job, logLevel: 'loud' }).success).toBe(false);
    });
  });
});
