import fs from 'node:fs/promises';
import { getErrorCode, getErrorMessage } from '../core/utils/errors.js';
import { resolveEventPath } from '../core/utils/path-utils.js';
import { RawEventKind, type FilterDecision, type RawEvent } from './types.js';

/**
 * A string is a filename suffix; a RegExp is tested against the filename.
 */
export type NoisePattern = string | RegExp;

/** Alternate data stream copied over from Windows alongside the real file */
export const DEFAULT_NOISE_PATTERNS: readonly NoisePattern[] = [':Zone.Identifier'];

export type PathInspector = (absPath: string) => Promise<{ isFile(): boolean }>;

export interface EventFilterOptions {
  ignore?: readonly NoisePattern[];
  /** Dispatch only filenames with one of these extensions; empty means all */
  extensions?: readonly string[];
  inspect?: PathInspector;
}

export function matchNoisePattern(filename: string, patterns: readonly NoisePattern[]): NoisePattern | undefined {
  return patterns.find(pattern =>
    typeof pattern === 'string' ? filename.endsWith(pattern) : pattern.test(filename)
  );
}

const normalizeExtension = (ext: string): string =>
  (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();

export class EventFilter {
  private readonly ignore: readonly NoisePattern[];
  private readonly extensions: string[];
  private readonly inspect: PathInspector;

  constructor(options: EventFilterOptions = {}) {
    this.ignore = options.ignore ?? DEFAULT_NOISE_PATTERNS;
    this.extensions = (options.extensions ?? []).map(normalizeExtension);
    this.inspect = options.inspect ?? (absPath => fs.stat(absPath));
  }

  async filter(event: RawEvent): Promise<FilterDecision> {
    const filePath = resolveEventPath(event.directory, event.filename);

    if (event.kind !== RawEventKind.WriteCompleted) {
      return { accepted: false, path: filePath, reason: 'not-write-completed', detail: event.nativeEvent };
    }

    const noise = matchNoisePattern(event.filename, this.ignore);
    if (noise !== undefined) {
      return { accepted: false, path: filePath, reason: 'transient-artifact', detail: String(noise) };
    }

    if (this.extensions.length > 0) {
      const lower = event.filename.toLowerCase();
      if (!this.extensions.some(ext => lower.endsWith(ext))) {
        return { accepted: false, path: filePath, reason: 'excluded-extension' };
      }
    }

    try {
      const stats = await this.inspect(filePath);
      if (!stats.isFile()) {
        return { accepted: false, path: filePath, reason: 'not-regular-file' };
      }
    } catch (error) {
      const reason = getErrorCode(error) === 'ENOENT' ? 'missing' : 'unreadable';
      return { accepted: false, path: filePath, reason, detail: getErrorMessage(error) };
    }

    return {
      accepted: true,
      candidate: { path: filePath, filename: event.filename, event },
    };
  }
}
