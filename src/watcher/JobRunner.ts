import { spawn, type ChildProcess } from 'node:child_process';
import { constants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import logger from '../core/utils/logger.js';
import { JobStartFailureError, getErrorCode, getErrorMessage, toError } from '../core/utils/errors.js';
import type { JobResult } from './types.js';

export interface PipelineCommand {
  /** Pipeline entry point: an executable, or a script when `interpreter` is set */
  entry: string;
  interpreter?: string;
  cwd?: string;
}

export interface JobRunner {
  run(filePath: string): Promise<JobResult>;
}

/** Where the pipeline's own output lines go */
export interface OutputSink {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

export function buildArgv(command: PipelineCommand, filePath: string): [string, string[]] {
  return command.interpreter
    ? [command.interpreter, [command.entry, filePath]]
    : [command.entry, [filePath]];
}

/**
 * Runs the external pipeline once per file and reports how it ended.
 * Never rejects: a process that cannot be launched resolves as `start-failed`.
 */
export class PipelineRunner implements JobRunner {
  constructor(
    private readonly command: PipelineCommand,
    private readonly output: OutputSink = logger
  ) {}

  async run(filePath: string): Promise<JobResult> {
    const startTime = Date.now();
    const [file, args] = buildArgv(this.command, filePath);

    // An interpreter starts even when its script is missing, then exits non-zero
    if (this.command.interpreter) {
      const script = path.resolve(this.command.cwd ?? process.cwd(), this.command.entry);
      try {
        await fs.access(script, constants.R_OK);
      } catch (error) {
        return this.startFailure(filePath, startTime, this.command.entry, args, error);
      }
    }

    return new Promise<JobResult>(resolve => {
      let settled = false;
      const settle = (result: JobResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      let child: ChildProcess;
      try {
        child = spawn(file, args, {
          cwd: this.command.cwd,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        settle(this.startFailure(filePath, startTime, file, args, error));
        return;
      }

      this.forward(child.stdout, filePath, 'info');
      this.forward(child.stderr, filePath, 'warn');

      child.once('error', error => {
        if (child.pid === undefined) {
          settle(this.startFailure(filePath, startTime, file, args, error));
        } else {
          logger.warn({ file: filePath, err: error }, `Pipeline process error: ${error.message}`);
        }
      });

      child.once('close', (code, signal) => {
        settle({
          path: filePath,
          status: 'exited',
          exitCode: code,
          signal,
          durationMs: Date.now() - startTime,
        });
      });
    });
  }

  private startFailure(filePath: string, startTime: number, file: string, args: string[], error: unknown): JobResult {
    return {
      path: filePath,
      status: 'start-failed',
      exitCode: null,
      signal: null,
      durationMs: Date.now() - startTime,
      error: new JobStartFailureError(`Could not start ${file}: ${getErrorMessage(error)}`, {
        cause: toError(error),
        context: { file, args, errno: getErrorCode(error) },
      }),
    };
  }

  private forward(stream: Readable | null, filePath: string, level: 'info' | 'warn'): void {
    if (!stream) return;
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('line', line => this.output[level]({ file: filePath, stream: level === 'info' ? 'stdout' : 'stderr' }, line));
  }
}
