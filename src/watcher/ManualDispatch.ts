import fs from 'node:fs/promises';
import path from 'node:path';
import { assertWatchable } from './DirectoryEventSource.js';
import type { EventFilter } from './EventFilter.js';
import type { JobRunner } from './JobRunner.js';
import type { OutcomeReporter } from './OutcomeReporter.js';
import { RawEventKind, type FilterDecision, type JobResult, type RawEvent } from './types.js';

export interface ManualDispatchDeps {
  filter: EventFilter;
  runner: JobRunner;
  reporter: OutcomeReporter;
}

export type ManualOutcome =
  | { dispatched: true; result: JobResult }
  | { dispatched: false; decision: Extract<FilterDecision, { accepted: false }> };

export interface BatchSummary {
  dispatched: number;
  succeeded: number;
  skipped: number;
  results: JobResult[];
}

/**
 * A file named by the operator is treated as a finished write.
 */
export function manualEvent(directory: string, filename: string): RawEvent {
  return { directory, kind: RawEventKind.WriteCompleted, filename, nativeEvent: 'manual' };
}

export const isSuccess = (result: JobResult): boolean =>
  result.status === 'exited' && result.exitCode === 0;

/**
 * Filter and run one file in the foreground.
 */
export async function dispatchFile(deps: ManualDispatchDeps, filePath: string): Promise<ManualOutcome> {
  const event = manualEvent(path.dirname(filePath), path.basename(filePath));
  deps.reporter.detected(event);

  const decision = await deps.filter.filter(event);
  if (!decision.accepted) {
    deps.reporter.skipped(decision);
    return { dispatched: false, decision };
  }

  deps.reporter.started(decision.candidate.path);
  const result = await deps.runner.run(decision.candidate.path);
  deps.reporter.finished(result);
  return { dispatched: true, result };
}

/**
 * Run every file already in `directory`, one at a time, in name order.
 * Covers files written while no watcher was running.
 */
export async function dispatchDirectory(deps: ManualDispatchDeps, directory: string): Promise<BatchSummary> {
  await assertWatchable(directory);

  const names = (await fs.readdir(directory)).sort();
  const summary: BatchSummary = { dispatched: 0, succeeded: 0, skipped: 0, results: [] };

  for (const name of names) {
    const outcome = await dispatchFile(deps, path.join(directory, name));
    if (!outcome.dispatched) {
      summary.skipped++;
      continue;
    }
    summary.dispatched++;
    summary.results.push(outcome.result);
    if (isSuccess(outcome.result)) summary.succeeded++;
  }

  return summary;
}
