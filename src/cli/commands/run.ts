import { Command } from 'commander';
import path from 'node:path';
import chalk from 'chalk';
import { EventFilter, OutcomeReporter, PipelineRunner, dispatchFile } from '../../watcher/index.js';
import { toAbs } from '../../core/utils/path-utils.js';
import { run } from '../utils/command-runner.js';
import { configFromOptions, type PipelineOptions } from '../utils/config-options.js';

export function createRunCommand(): Command {
  const command = new Command('run');

  command
    .description('run the pipeline once on a single file and exit with its exit code')
    .argument('<file>', 'file to process')
    .option('-p, --pipeline <path>', 'pipeline entry point (default: $DROPWATCH_PIPELINE)')
    .option('-i, --interpreter <command>', 'interpreter for the entry point, e.g. python3')
    .option('-v, --verbose', 'enable verbose logging')
    .action((file: string, options: PipelineOptions) => run(() => handleRun(file, options)));

  return command;
}

async function handleRun(file: string, options: PipelineOptions): Promise<void> {
  const filePath = toAbs(file);
  const config = configFromOptions(path.dirname(filePath), options);

  const outcome = await dispatchFile(
    {
      filter: new EventFilter({ ignore: config.filter.ignoreSuffixes, extensions: config.filter.extensions }),
      runner: new PipelineRunner(config.pipeline),
      reporter: new OutcomeReporter(),
    },
    filePath
  );

  if (!outcome.dispatched) {
    console.error(chalk.yellow(`⚠ ${filePath} was not dispatched (${outcome.decision.reason})`));
    process.exitCode = 1;
    return;
  }

  process.exitCode = outcome.result.exitCode ?? 1;
}
