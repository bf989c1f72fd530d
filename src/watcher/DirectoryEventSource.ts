import { watch, type FSWatcher } from 'chokidar';
import fs from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import logger from '../core/utils/logger.js';
import { WatchUnavailableError, getErrorMessage, toError } from '../core/utils/errors.js';
import { EventChannel } from './EventChannel.js';
import { RawEventKind, type RawEvent, type EventSource, type EventSubscription } from './types.js';

export interface DirectoryEventSourceOptions {
  /** How long a file's size must stay unchanged before its write counts as finished */
  stabilityThreshold?: number;
  pollInterval?: number;
}

// chokidar only emits add/change for a file once awaitWriteFinish has seen it settle
const WRITE_COMPLETED_EVENTS = new Set(['add', 'change']);

export function toRawEvent(directory: string, nativeEvent: string, filePath: string): RawEvent {
  return {
    directory,
    kind: WRITE_COMPLETED_EVENTS.has(nativeEvent) ? RawEventKind.WriteCompleted : RawEventKind.Other,
    filename: path.relative(directory, filePath),
    nativeEvent,
  };
}

export async function assertWatchable(directory: string): Promise<void> {
  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) {
      throw new WatchUnavailableError(`Cannot watch ${directory}: not a directory`, {
        context: { directory },
      });
    }
    await fs.access(directory, constants.R_OK | constants.X_OK);
  } catch (error) {
    if (error instanceof WatchUnavailableError) throw error;
    throw new WatchUnavailableError(`Cannot watch ${directory}: ${getErrorMessage(error)}`, {
      cause: toError(error),
      context: { directory },
    });
  }
}

function whenReady(watcher: FSWatcher): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => reject(err);
    watcher.once('error', onError);
    watcher.once('ready', () => {
      watcher.off('error', onError);
      resolve();
    });
  });
}

// The parent watch only detects removal; its errors never fail the subscription
function whenSettled(watcher: FSWatcher): Promise<void> {
  return new Promise<void>(resolve => {
    watcher.once('ready', () => resolve());
    watcher.once('error', () => resolve());
  });
}

/**
 * Event source backed by a non-recursive chokidar watch of one directory.
 */
export class DirectoryEventSource implements EventSource {
  private readonly stabilityThreshold: number;
  private readonly pollInterval: number;

  constructor(options: DirectoryEventSourceOptions = {}) {
    this.stabilityThreshold = options.stabilityThreshold ?? 2000;
    this.pollInterval = options.pollInterval ?? 100;
  }

  async subscribe(directory: string): Promise<EventSubscription> {
    await assertWatchable(directory);

    logger.info(`Starting file watcher on ${directory}`);

    const channel = new EventChannel<RawEvent>();
    const root = path.resolve(directory);

    const watcher: FSWatcher = watch(directory, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish:
        this.stabilityThreshold > 0
          ? { stabilityThreshold: this.stabilityThreshold, pollInterval: this.pollInterval }
          : false,
      depth: 0,
      followSymlinks: false,
    });

    const removed = () =>
      channel.fail(new WatchUnavailableError(`Watched directory ${directory} was removed`, { context: { directory } }));

    watcher
      .on('all', (eventName, filePath) => {
        if (eventName === 'unlinkDir' && path.resolve(filePath) === root) {
          removed();
          return;
        }
        channel.push(toRawEvent(directory, eventName, filePath));
      })
      .on('error', err => {
        logger.error(`Watcher error: ${getErrorMessage(err)}`);
        channel.fail(
          new WatchUnavailableError(`Watch on ${directory} failed: ${getErrorMessage(err)}`, {
            cause: toError(err),
            context: { directory },
          })
        );
      });

    // A watch on the directory itself never reports its own removal
    const parent = path.dirname(root);
    const parentWatcher: FSWatcher | undefined =
      parent === root
        ? undefined
        : watch(parent, {
            persistent: true,
            ignoreInitial: true,
            depth: 0,
            followSymlinks: false,
            ignored: (candidate: string) => {
              const resolved = path.resolve(candidate);
              return resolved !== parent && resolved !== root;
            },
          });

    parentWatcher
      ?.on('unlinkDir', dirPath => {
        if (path.resolve(dirPath) === root) removed();
      })
      .on('error', err => {
        logger.warn(`Cannot watch ${parent} for removal of ${directory}: ${getErrorMessage(err)}`);
      });

    const closeAll = async () => {
      await Promise.all([watcher.close(), parentWatcher?.close()]);
    };

    try {
      await Promise.all([whenReady(watcher), parentWatcher ? whenSettled(parentWatcher) : undefined]);
    } catch (error) {
      await closeAll();
      throw new WatchUnavailableError(`Cannot watch ${directory}: ${getErrorMessage(error)}`, {
        cause: toError(error),
        context: { directory },
      });
    }

    logger.info('File watcher ready');

    return {
      [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
      close: async () => {
        logger.info('Stopping file watcher');
        channel.close();
        await closeAll();
      },
    };
  }
}
