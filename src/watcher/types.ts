import type { JobStartFailureError } from '../core/utils/errors.js';

export enum RawEventKind {
  WriteCompleted = 'write-completed',
  Other = 'other',
}

export interface RawEvent {
  /** Watched directory, as configured */
  directory: string;
  kind: RawEventKind;
  /** Name reported by the watcher, relative to `directory` */
  filename: string;
  /** Watcher's own event name (add, change, unlink, ...) */
  nativeEvent: string;
}

export interface CandidateFile {
  /** Absolute path on disk */
  path: string;
  filename: string;
  event: RawEvent;
}

export type SkipReason =
  | 'not-write-completed'
  | 'transient-artifact'
  | 'excluded-extension'
  | 'not-regular-file'
  | 'missing'
  | 'unreadable';

export type FilterDecision =
  | { accepted: true; candidate: CandidateFile }
  | { accepted: false; path: string; reason: SkipReason; detail?: string };

export type JobStatus = 'exited' | 'start-failed';

export interface JobResult {
  path: string;
  status: JobStatus;
  /** null when the process never started or was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  error?: JobStartFailureError;
}

/**
 * A live, unbounded stream of raw events for one directory. Not restartable:
 * after it ends or fails, subscribe again.
 */
export interface EventSubscription extends AsyncIterable<RawEvent> {
  close(): Promise<void>;
}

export interface EventSource {
  subscribe(directory: string): Promise<EventSubscription>;
}
