// Builders for bash steps

import { BashFileStep, InlineBashStep } from '../models/pipeline.js';

export const Bash = {
  /**
   * Runs the given lines as one inline script
   */
  inline(...scriptLines: string[]): InlineBashStep {
    return { kind: 'inline-bash', contents: scriptLines.join('\n') };
  },

  /**
   * Runs a script file, optionally with arguments
   */
  file(filePath: string, args?: string): BashFileStep {
    return args === undefined
      ? { kind: 'bash-file', filePath }
      : { kind: 'bash-file', filePath, arguments: args };
  }
};
