import { loadConfig, type AppConfig, type ConfigOverrides } from '../../core/utils/config.js';
import logger from '../../core/utils/logger.js';
import { toAbs } from '../../core/utils/path-utils.js';

export interface PipelineOptions {
  pipeline?: string;
  interpreter?: string;
  verbose?: boolean;
}

/**
 * Merge command-line flags over the environment and load the configuration.
 */
export function configFromOptions(directory: string | undefined, options: PipelineOptions): AppConfig {
  if (options.verbose) {
    logger.level = 'debug';
  }

  const overrides: ConfigOverrides = {};
  if (directory) overrides.DROPWATCH_DIR = toAbs(directory);
  if (options.pipeline) overrides.DROPWATCH_PIPELINE = options.pipeline;
  if (options.interpreter) overrides.DROPWATCH_INTERPRETER = options.interpreter;

  return loadConfig(overrides);
}
