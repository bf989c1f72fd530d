import { Command } from 'commander';
import chalk from 'chalk';
import { EventFilter, OutcomeReporter, PipelineRunner, dispatchDirectory, isSuccess } from '../../watcher/index.js';
import { run } from '../utils/command-runner.js';
import { configFromOptions, type PipelineOptions } from '../utils/config-options.js';

export function createBatchCommand(): Command {
  const command = new Command('batch');

  command
    .description('run the pipeline on every file already in the directory, one at a time')
    .argument('[directory]', 'directory to process (default: $DROPWATCH_DIR)')
    .option('-p, --pipeline <path>', 'pipeline entry point (default: $DROPWATCH_PIPELINE)')
    .option('-i, --interpreter <command>', 'interpreter for the entry point, e.g. python3')
    .option('-v, --verbose', 'enable verbose logging')
    .action((directory: string | undefined, options: PipelineOptions) => run(() => handleBatch(directory, options)));

  return command;
}

async function handleBatch(directory: string | undefined, options: PipelineOptions): Promise<void> {
  const config = configFromOptions(directory, options);

  console.log(chalk.cyan(`📦 Processing files in ${config.directory}`));

  const summary = await dispatchDirectory(
    {
      filter: new EventFilter({ ignore: config.filter.ignoreSuffixes, extensions: config.filter.extensions }),
      runner: new PipelineRunner(config.pipeline),
      reporter: new OutcomeReporter(),
    },
    config.directory
  );

  for (const result of summary.results) {
    const mark = isSuccess(result) ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${mark} ${result.path}`);
  }

  const line = `Processed ${summary.succeeded}/${summary.dispatched} file(s) successfully`;
  if (summary.succeeded === summary.dispatched) {
    console.log(chalk.green(line));
  } else {
    console.log(chalk.red(line));
    process.exitCode = 1;
  }
  if (summary.skipped > 0) {
    console.log(chalk.gray(`Skipped ${summary.skipped} entr${summary.skipped === 1 ? 'y' : 'ies'}`));
  }
}
