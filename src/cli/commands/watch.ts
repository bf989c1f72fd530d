import { Command } from 'commander';
import chalk from 'chalk';
import { WatcherService } from '../../watcher/index.js';
import { run } from '../utils/command-runner.js';
import { configFromOptions, type PipelineOptions } from '../utils/config-options.js';

export function createWatchCommand(): Command {
  const command = new Command('watch');

  command
    .description('watch a directory and run the pipeline on every finished file')
    .argument('[directory]', 'directory to watch (default: $DROPWATCH_DIR)')
    .option('-p, --pipeline <path>', 'pipeline entry point (default: $DROPWATCH_PIPELINE)')
    .option('-i, --interpreter <command>', 'interpreter for the entry point, e.g. python3')
    .option('-v, --verbose', 'enable verbose logging')
    .action((directory: string | undefined, options: PipelineOptions) => run(() => handleWatch(directory, options)));

  return command;
}

async function handleWatch(directory: string | undefined, options: PipelineOptions): Promise<void> {
  const config = configFromOptions(directory, options);

  console.log(chalk.cyan(`🔍 Watching ${config.directory}`));
  console.log(chalk.gray(`Pipeline: ${[config.pipeline.interpreter, config.pipeline.entry].filter(Boolean).join(' ')}`));
  console.log(chalk.gray('Press Ctrl+C to stop\n'));

  const service = new WatcherService(config);
  await service.start();
  await service.finished();
}
