import logger from '../core/utils/logger.js';
import { getErrorMessage } from '../core/utils/errors.js';
import type { AppConfig } from '../core/utils/config.js';
import { DirectoryEventSource } from './DirectoryEventSource.js';
import { DispatchGate } from './DispatchGate.js';
import { Dispatcher } from './Dispatcher.js';
import { EventFilter } from './EventFilter.js';
import { PipelineRunner, type JobRunner } from './JobRunner.js';
import { OutcomeReporter } from './OutcomeReporter.js';
import type { EventSource, EventSubscription } from './types.js';

export interface WatcherServiceOptions {
  source?: EventSource;
  runner?: JobRunner;
  reporter?: OutcomeReporter;
  /** Stop and drain on SIGINT/SIGTERM, then exit the process */
  handleSignals?: boolean;
}

export class WatcherService {
  private readonly source: EventSource;
  private readonly dispatcher: Dispatcher;
  private readonly handleSignals: boolean;
  private subscription?: EventSubscription;
  private loop?: Promise<void>;
  private stopping = false;

  constructor(
    private readonly config: AppConfig,
    options: WatcherServiceOptions = {}
  ) {
    this.source =
      options.source ??
      new DirectoryEventSource({
        stabilityThreshold: config.writeFinish.stabilityThreshold,
        pollInterval: config.writeFinish.pollInterval,
      });

    this.dispatcher = new Dispatcher({
      filter: new EventFilter({
        ignore: config.filter.ignoreSuffixes,
        extensions: config.filter.extensions,
      }),
      gate: new DispatchGate(),
      runner: options.runner ?? new PipelineRunner(config.pipeline),
      reporter: options.reporter ?? new OutcomeReporter(),
    });

    this.handleSignals = options.handleSignals ?? true;
  }

  /**
   * Subscribe to the watched directory and start dispatching. Rejects with
   * WatchUnavailableError when the directory cannot be watched.
   */
  async start(): Promise<void> {
    if (this.loop) {
      logger.warn('Watcher service already running');
      return;
    }

    logger.info('Starting watcher service');

    const subscription = await this.source.subscribe(this.config.directory);
    this.subscription = subscription;
    this.loop = this.dispatcher.consume(subscription).catch(async error => {
      logger.error(`Lost watch on ${this.config.directory}`);
      await subscription.close();
      throw error;
    });

    if (this.handleSignals) {
      this.setupShutdownHandlers();
    }

    logger.info(`Watcher service started on ${this.config.directory}`);
  }

  /**
   * Resolves when the loop ends after `stop()`; rejects if the watch is lost.
   */
  async finished(): Promise<void> {
    if (!this.loop) return;
    await this.loop;
  }

  async stop(): Promise<void> {
    if (this.stopping || !this.subscription) return;
    this.stopping = true;

    logger.info('Stopping watcher service');

    await this.subscription.close();
    await this.loop;

    const pending = this.dispatcher.inFlight();
    if (pending > 0) {
      logger.info(`Waiting for ${pending} running job(s) to finish`);
    }
    await this.dispatcher.drain();

    logger.info('Watcher service stopped');
  }

  private setupShutdownHandlers(): void {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}`);
      this.stop().then(
        () => process.exit(0),
        error => {
          logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}
