// Logger that keeps formatted lines in memory for assertions

import { Logger, LogLevel } from '../core/logger.js';

export class RecordingLogger extends Logger {
  readonly lines: string[] = [];

  constructor() {
    super({ level: LogLevel.DEBUG, prefix: '' });
  }

  debug(message: string): void {
    this.lines.push(`DEBUG ${message}`);
  }

  info(message: string): void {
    this.lines.push(`INFO ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`WARN ${message}`);
  }

  error(message: string): void {
    this.lines.push(`ERROR ${message}`);
  }

  exception(error: Error): void {
    this.lines.push(`ERROR ${error.message}`);
  }

  /**
   * Lines at or above INFO, the ones a default run shows
   */
  visible(): string[] {
    return this.lines.filter(line => !line.startsWith('DEBUG '));
  }

  clear(): void {
    this.lines.length = 0;
  }
}
