#!/usr/bin/env node

import { Command } from 'commander';
import { createWatchCommand } from './commands/watch.js';
import { createRunCommand } from './commands/run.js';
import { createBatchCommand } from './commands/batch.js';

const program = new Command();

program
  .name('dropwatch')
  .description('watch a directory for finished files and hand each one to a pipeline')
  .version('0.1.0');

program.addCommand(createWatchCommand(), { isDefault: true });
program.addCommand(createRunCommand());
program.addCommand(createBatchCommand());

await program.parseAsync(process.argv);
