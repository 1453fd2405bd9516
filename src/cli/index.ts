#!/usr/bin/env node
// pipeline-kit CLI

import { Command } from 'commander';
import { registerPublishCommand } from './commands/publish.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerListCommand } from './commands/list.js';
import { registerInitCommand } from './commands/init.js';
import { registerHooksCommand } from './commands/hooks.js';

const program = new Command();

program
  .name('pipeline-kit')
  .description('Publish pipeline definitions written in TypeScript as YAML files')
  .version('0.1.0');

registerPublishCommand(program);
registerValidateCommand(program);
registerListCommand(program);
registerInitCommand(program);
registerHooksCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
