import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import { EventChannel } from '../watcher/EventChannel.js';
import type { ReportSink } from '../watcher/OutcomeReporter.js';
import { RawEventKind, type EventSource, type EventSubscription, type JobResult, type RawEvent } from '../watcher/types.js';

/**
 * In-memory event source for driving the dispatch loop without a filesystem.
 */
export class SyntheticEventSource implements EventSource {
  readonly channel = new EventChannel<RawEvent>();
  readonly subscribed: string[] = [];

  async subscribe(directory: string): Promise<EventSubscription> {
    this.subscribed.push(directory);
    return {
      [Symbol.asyncIterator]: () => this.channel[Symbol.asyncIterator](),
      close: async () => this.channel.close(),
    };
  }

  emit(event: RawEvent): void {
    this.channel.push(event);
  }
}

export function writeCompleted(directory: string, filename: string): RawEvent {
  return { directory, kind: RawEventKind.WriteCompleted, filename, nativeEvent: 'change' };
}

export function otherEvent(directory: string, filename: string, nativeEvent = 'unlink'): RawEvent {
  return { directory, kind: RawEventKind.Other, filename, nativeEvent };
}

export function createSink() {
  return {
    debug: vi.fn<ReportSink['debug']>(),
    info: vi.fn<ReportSink['info']>(),
    warn: vi.fn<ReportSink['warn']>(),
    error: vi.fn<ReportSink['error']>(),
  };
}

/** Every message passed to the sink, in call order across levels */
export function messages(sink: ReturnType<typeof createSink>): string[] {
  const calls = (['debug', 'info', 'warn', 'error'] as const).flatMap(level =>
    sink[level].mock.calls.map((call, i) => ({ order: sink[level].mock.invocationCallOrder[i], msg: call[1] }))
  );
  return calls.sort((a, b) => a.order - b.order).map(c => c.msg);
}

export function exitedResult(filePath: string, exitCode = 0): JobResult {
  return { path: filePath, status: 'exited', exitCode, signal: null, durationMs: 5 };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function makeTempDir(prefix: string): Promise<string> {
  const root = process.env.DROPWATCH_TEST_ROOT ?? os.tmpdir();
  return fs.mkdtemp(path.join(root, `${prefix}-`));
}

/** Let queued promise callbacks run */
export const flush = () => new Promise<void>(resolve => setImmediate(resolve));
