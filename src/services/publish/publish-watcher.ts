// Re-publishes whenever the compiled definitions module is rebuilt

import * as path from 'path';
import { watch, FSWatcher } from 'chokidar';
import { errorMessage, toError } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { RunResult } from '../../models/types.js';
import { PublishCycle } from './publish-cycle.js';

const DEBOUNCE_MS = 300;

const SCRIPT_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);

/**
 * Runs publish cycles back to back, never overlapping. A change that arrives
 * while a cycle is running queues exactly one more cycle.
 *
 * The whole directory of the module is watched, since a rebuild may only rewrite
 * files the entry module imports.
 */
export class PublishWatcher {
  private watcher: FSWatcher | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private pending = false;
  private pendingChange: string | undefined;

  constructor(
    private readonly cycle: PublishCycle,
    private readonly onResult: (result: RunResult) => void = () => undefined,
    private readonly log: Logger = defaultLogger
  ) {}

  get watchRoot(): string {
    return path.dirname(this.cycle.modulePath);
  }

  start(): void {
    if (this.watcher) {
      return;
    }

    this.watcher = watch(this.watchRoot, {
      persistent: true,
      ignoreInitial: true,
      ignored: /(^|[/\\])node_modules([/\\]|$)/
    });

    const schedule = (changedPath: string) => {
      if (!SCRIPT_EXTENSIONS.has(path.extname(changedPath))) {
        return;
      }
      if (this.debounceTimer) {
        clearTimeout(this.debounceTimer);
      }
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = null;
        this.trigger(changedPath);
      }, DEBOUNCE_MS);
    };

    this.watcher.on('change', schedule);
    this.watcher.on('add', schedule);
    this.watcher.on('error', error => this.log.error(`Watcher error: ${errorMessage(error)}`));
  }

  /**
   * Starts a cycle now, or queues one if a cycle is in progress.
   * Without `changedPath` the cycle is the initial publish.
   */
  trigger(changedPath?: string): void {
    if (this.running) {
      this.pending = true;
      this.pendingChange = changedPath ?? this.pendingChange;
      return;
    }

    this.running = this.runCycle(changedPath).finally(() => {
      this.running = null;
      if (this.pending) {
        const queued = this.pendingChange;
        this.pending = false;
        this.pendingChange = undefined;
        this.trigger(queued);
      }
    });
  }

  /**
   * Resolves once the current cycle (and any queued one) has finished
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.pending = false;
    this.pendingChange = undefined;
    await this.idle();
  }

  private async runCycle(changedPath: string | undefined): Promise<void> {
    if (changedPath) {
      this.log.info(`Change detected in ${changedPath}, publishing...`);
    } else {
      this.log.info(`Publishing ${this.cycle.modulePath}...`);
    }

    try {
      this.onResult(await this.cycle.run());
    } catch (error) {
      this.log.exception(toError(error));
    }
  }
}
