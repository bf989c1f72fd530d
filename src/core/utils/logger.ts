import pino, { type TransportTargetOptions } from 'pino';

// Resolve the desired log level once, in order of preference:
// 1. Explicit LOG_LEVEL env var
// 2. Shortcut DEBUG env var (any truthy value enables "debug")
// 3. Fallback to the default "info" level
const logLevel = process.env.LOG_LEVEL ?? (process.env.DEBUG ? 'debug' : 'info');

/**
 * Build the transport targets for the current environment. Targets accept
 * every level; filtering happens on the logger itself so that `logger.level`
 * can be raised at runtime (e.g. by `--verbose`).
 */
export function buildTransportTargets(env: NodeJS.ProcessEnv = process.env): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (env.NODE_ENV === 'production') {
    targets.push({ target: 'pino/file', level: 'trace', options: { destination: 1 } });
  } else {
    targets.push({
      target: 'pino-pretty',
      level: 'trace',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:standard',
      },
    });
  }

  if (env.DROPWATCH_LOG_FILE) {
    targets.push({
      target: 'pino/file',
      level: 'trace',
      options: { destination: env.DROPWATCH_LOG_FILE, mkdir: true },
    });
  }

  return targets;
}

// Tests log synchronously to stdout; worker-thread transports outlive the run.
const logger = pino({
  level: logLevel,
  transport: process.env.NODE_ENV === 'test' ? undefined : { targets: buildTransportTargets() },
});

export type { Logger } from 'pino';
export default logger;
