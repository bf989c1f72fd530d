import { logError } from '../core/utils/errors.js';
import type { DispatchGate } from './DispatchGate.js';
import type { EventFilter } from './EventFilter.js';
import type { JobRunner } from './JobRunner.js';
import type { OutcomeReporter } from './OutcomeReporter.js';
import type { FilterDecision, RawEvent } from './types.js';

export interface DispatcherDeps {
  filter: EventFilter;
  gate: DispatchGate;
  runner: JobRunner;
  reporter: OutcomeReporter;
}

/**
 * The control loop: filter each raw event, admit it through the gate and run
 * the pipeline for it without waiting, so a slow file never holds up others.
 */
export class Dispatcher {
  private readonly filter: EventFilter;
  private readonly gate: DispatchGate;
  private readonly runner: JobRunner;
  private readonly reporter: OutcomeReporter;

  constructor(deps: DispatcherDeps) {
    this.filter = deps.filter;
    this.gate = deps.gate;
    this.runner = deps.runner;
    this.reporter = deps.reporter;
  }

  /**
   * Consume events until the stream ends. A failing stream (the watch was
   * lost) rejects; nothing else does.
   */
  async consume(events: AsyncIterable<RawEvent>): Promise<void> {
    for await (const event of events) {
      await this.handle(event);
    }
  }

  /**
   * Returns true when the event started a job.
   */
  async handle(event: RawEvent): Promise<boolean> {
    this.reporter.detected(event);

    let decision: FilterDecision;
    try {
      decision = await this.filter.filter(event);
    } catch (error) {
      logError(error, 'filter', { filename: event.filename });
      return false;
    }

    if (!decision.accepted) {
      this.reporter.skipped(decision);
      return false;
    }

    const { path } = decision.candidate;
    if (!this.gate.admit(path)) {
      this.reporter.rejected(path);
      return false;
    }

    this.reporter.started(path);
    void this.execute(path);
    return true;
  }

  /**
   * Resolves once every admitted job has finished.
   */
  drain(): Promise<void> {
    return this.gate.onIdle();
  }

  inFlight(): number {
    return this.gate.size();
  }

  private async execute(path: string): Promise<void> {
    try {
      const result = await this.runner.run(path);
      this.reporter.finished(result);
    } catch (error) {
      logError(error, 'job', { path });
    } finally {
      this.gate.release(path);
    }
  }
}
