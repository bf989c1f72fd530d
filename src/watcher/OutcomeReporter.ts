import logger from '../core/utils/logger.js';
import { getErrorMessage } from '../core/utils/errors.js';
import { resolveEventPath } from '../core/utils/path-utils.js';
import { RawEventKind, type FilterDecision, type JobResult, type RawEvent } from './types.js';

type Level = 'debug' | 'info' | 'warn' | 'error';

export type ReportSink = Record<Level, (obj: Record<string, unknown>, msg: string) => void>;

type SkippedDecision = Extract<FilterDecision, { accepted: false }>;

/**
 * Log sink for the dispatch loop. Every method swallows logging failures so
 * a broken log destination cannot stop dispatch.
 */
export class OutcomeReporter {
  constructor(private readonly sink: ReportSink = logger) {}

  detected(event: RawEvent): void {
    const filePath = resolveEventPath(event.directory, event.filename);
    const level = event.kind === RawEventKind.WriteCompleted ? 'info' : 'debug';
    this.emit(level, { stage: 'detected', path: filePath, event: event.nativeEvent }, `Detected ${event.nativeEvent} on ${filePath}`);
  }

  skipped(decision: SkippedDecision): void {
    const fields = { stage: 'skipped', path: decision.path, reason: decision.reason };

    switch (decision.reason) {
      case 'not-write-completed':
        this.emit('debug', fields, `Skipped ${decision.path}: not a finished write`);
        return;
      case 'transient-artifact':
        this.emit('info', fields, `Ignoring transient artifact ${decision.path}`);
        return;
      case 'excluded-extension':
        this.emit('info', fields, `Skipped ${decision.path}: extension not dispatched`);
        return;
      case 'not-regular-file':
        this.emit('info', fields, `Skipped ${decision.path}: not a regular file`);
        return;
      case 'missing':
        this.emit('warn', fields, `Skipped ${decision.path}: file disappeared before dispatch`);
        return;
      case 'unreadable':
        this.emit('warn', fields, `Skipped ${decision.path}: ${decision.detail ?? 'cannot be read'}`);
        return;
    }
  }

  rejected(filePath: string): void {
    this.emit('info', { stage: 'rejected', path: filePath }, `Dropped event for ${filePath}: a job for this file is still running`);
  }

  started(filePath: string): void {
    this.emit('info', { stage: 'started', path: filePath }, `Starting pipeline on ${filePath}`);
  }

  finished(result: JobResult): void {
    const fields = {
      stage: 'finished',
      path: result.path,
      status: result.status,
      exitCode: result.exitCode,
      signal: result.signal,
      durationMs: result.durationMs,
    };

    if (result.status === 'start-failed') {
      const reason = result.error ? result.error.message : 'unknown error';
      this.emit('error', fields, `Pipeline could not start for ${result.path}: ${reason}`);
      return;
    }

    if (result.signal) {
      this.emit('warn', fields, `Pipeline for ${result.path} was terminated by ${result.signal}`);
      return;
    }

    const message = `Pipeline finished for ${result.path} with exit code ${result.exitCode} (${result.durationMs}ms)`;
    this.emit(result.exitCode === 0 ? 'info' : 'warn', fields, message);
  }

  private emit(level: Level, fields: Record<string, unknown>, msg: string): void {
    try {
      this.sink[level](fields, msg);
    } catch (error) {
      process.stderr.write(`[dropwatch] failed to write log line: ${getErrorMessage(error)}\n${msg}\n`);
    }
  }
}
