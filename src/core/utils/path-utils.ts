/**
 * Path helpers for the watched directory.
 */

import path from 'node:path';

/**
 * Absolute path of `filename` inside `directory`. A trailing separator on
 * the directory makes no difference: `/data` and `/data/` both give
 * `/data/a.fits`.
 */
export const resolveEventPath = (directory: string, filename: string): string =>
  path.join(directory, filename);

export const toAbs = (inputPath: string, base: string = process.cwd()): string =>
  path.isAbsolute(inputPath) ? path.normalize(inputPath) : path.resolve(base, inputPath);

/**
 * A command containing a path separator is a path and is made absolute;
 * a bare name such as `python3` is left for `PATH` lookup.
 */
export const resolveCommand = (command: string, base: string = process.cwd()): string =>
  command.includes('/') || command.includes(path.sep) ? toAbs(command, base) : command;
