import logger from '../../core/utils/logger.js';
import { isDropwatchError } from '../../core/utils/errors.js';

/**
 * Wrap an async command function so any un-handled error is logged and the
 * process exits with a non-zero code. Use it like:
 *   program.command('foo').action((...args) => run(() => foo(args)))
 */
export function run(fn: () => Promise<void>): void {
  fn().catch(err => {
    if (isDropwatchError(err)) {
      logger.error({ code: err.code, context: err.context }, `❌ ${err.message}`);
    } else if (err instanceof Error) {
      logger.error({ stack: err.stack }, `❌ ${err.message}`);
    } else {
      logger.error(`❌ ${String(err)}`);
    }
    process.exit(1);
  });
}
