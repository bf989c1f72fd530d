import { describe, it, expect, beforeAll, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PipelineRunner, buildArgv, type OutputSink } from './JobRunner.js';
import { JobStartFailureError } from '../core/utils/errors.js';
import { makeTempDir } from '../tests/helpers.js';

const PIPELINE_SCRIPT = `
const file = process.argv[2];
console.log('processing ' + file);
if (file.endsWith('fail.fits')) {
  console.error('bad header in ' + file);
  process.exit(3);
}
if (file.endsWith('killed.fits')) {
  process.kill(process.pid, 'SIGTERM');
}
`;

function createOutput() {
  return {
    info: vi.fn<OutputSink['info']>(),
    warn: vi.fn<OutputSink['warn']>(),
  };
}

describe('buildArgv', () => {
  it('should pass the file as the only argument of the entry point', () => {
    expect(buildArgv({ entry: '/opt/pipeline/run.sh' }, '/data/a.fits')).toEqual(['/opt/pipeline/run.sh', ['/data/a.fits']]);
  });

  it('should put the entry point after the interpreter', () => {
    expect(buildArgv({ entry: '/opt/automate.py', interpreter: 'python3' }, '/data/a.fits')).toEqual([
      'python3',
      ['/opt/automate.py', '/data/a.fits'],
    ]);
  });
});

describe('PipelineRunner', () => {
  let script: string;

  beforeAll(async () => {
    const dir = await makeTempDir('runner');
    script = path.join(dir, 'pipeline.cjs');
    await fs.writeFile(script, PIPELINE_SCRIPT);
  });

  it('should report exit code 0 for a successful run', async () => {
    const runner = new PipelineRunner({ entry: script, interpreter: process.execPath }, createOutput());

    const result = await runner.run('/data/cube001.fits');

    expect(result).toMatchObject({
      path: '/data/cube001.fits',
      status: 'exited',
      exitCode: 0,
      signal: null,
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(result.error).toBeUndefined();
  });

  it('should report a non-zero exit without treating it as a start failure', async () => {
    const runner = new PipelineRunner({ entry: script, interpreter: process.execPath }, createOutput());

    const result = await runner.run('/data/fail.fits');

    expect(result).toMatchObject({ status: 'exited', exitCode: 3, signal: null });
  });

  it('should forward pipeline output lines tagged with the file', async () => {
    const output = createOutput();
    const runner = new PipelineRunner({ entry: script, interpreter: process.execPath }, output);

    await runner.run('/data/fail.fits');

    expect(output.info).toHaveBeenCalledWith({ file: '/data/fail.fits', stream: 'stdout' }, 'processing /data/fail.fits');
    expect(output.warn).toHaveBeenCalledWith({ file: '/data/fail.fits', stream: 'stderr' }, 'bad header in /data/fail.fits');
  });

  it('should report the signal when the pipeline is killed', async () => {
    const runner = new PipelineRunner({ entry: script, interpreter: process.execPath }, createOutput());

    const result = await runner.run('/data/killed.fits');

    expect(result).toMatchObject({ status: 'exited', exitCode: null, signal: 'SIGTERM' });
  });

  it('should report a missing entry point as a start failure', async () => {
    const runner = new PipelineRunner({ entry: '/nonexistent/dropwatch-pipeline' }, createOutput());

    const result = await runner.run('/data/cube001.fits');

    expect(result).toMatchObject({
      path: '/data/cube001.fits',
      status: 'start-failed',
      exitCode: null,
      signal: null,
    });
    expect(result.error).toBeInstanceOf(JobStartFailureError);
    expect(result.error?.code).toBe('JOB_START_FAILURE');
    expect(result.error?.context).toMatchObject({ file: '/nonexistent/dropwatch-pipeline', errno: 'ENOENT' });
  });

  it('should report a missing interpreter as a start failure', async () => {
    const runner = new PipelineRunner({ entry: script, interpreter: '/nonexistent/python3' }, createOutput());

    const result = await runner.run('/data/cube001.fits');

    expect(result.status).toBe('start-failed');
    expect(result.error?.message).toMatch(/^Could not start \/nonexistent\/python3: /);
  });

  it('should report a missing script as a start failure when an interpreter is set', async () => {
    const runner = new PipelineRunner({ entry: '/nonexistent/automate.js', interpreter: process.execPath }, createOutput());

    const result = await runner.run('/data/cube001.fits');

    expect(result).toMatchObject({
      path: '/data/cube001.fits',
      status: 'start-failed',
      exitCode: null,
      signal: null,
    });
    expect(result.error).toBeInstanceOf(JobStartFailureError);
    expect(result.error?.message).toMatch(/^Could not start \/nonexistent\/automate\.js: /);
    expect(result.error?.context).toMatchObject({
      file: '/nonexistent/automate.js',
      args: ['/nonexistent/automate.js', '/data/cube001.fits'],
      errno: 'ENOENT',
    });
  });

  it('should resolve a relative script against the working directory', async () => {
    const runner = new PipelineRunner(
      { entry: path.basename(script), interpreter: process.execPath, cwd: path.dirname(script) },
      createOutput()
    );

    const result = await runner.run('/data/cube001.fits');

    expect(result).toMatchObject({ status: 'exited', exitCode: 0 });
  });
});
