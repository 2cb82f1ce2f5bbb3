import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AdapterError, type PipelineLogger } from '@spatial-audio/contracts';

import { runCli } from '../src/cli.js';
import type { PipelineConfig } from '../src/config.js';
import { createPipeline, type PipelineOverrides } from '../src/pipeline.js';

describe('cli', () => {
  let dataDir: string;
  let audioPath: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'spatial-cli-'));
    audioPath = join(dataDir, 'take1.wav');
    await writeFile(audioPath, 'not really audio');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  const config = (): PipelineConfig => ({
    dataDir,
    maxUploadBytes: 1024,
    separation: { version: 'v1', timeoutMs: 1000, stem: 'vocals' },
    transcription: { version: 'v1', timeoutMs: 1000 },
    spatialize: { enabled: true, model: 'test-model', timeoutMs: 1000, chunkSize: 24, contextWords: 8 },
  });

  const pipelineFactory =
    (overrides: PipelineOverrides = {}) =>
    (logger: PipelineLogger) =>
      createPipeline(config(), { ...overrides, logger });

  const captureJson = () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    return () => {
      const last = logSpy.mock.calls[logSpy.mock.calls.length - 1];
      return JSON.parse(String(last?.[0]));
    };
  };

  it('processes a file and prints the job as JSON', async () => {
    const output = captureJson();

    const code = await runCli(['process', audioPath, '--language', 'en', '--no-spatialize', '--json'], {
      createPipeline: pipelineFactory(),
    });

    expect(code).toBe(0);
    const { events, result } = output();
    expect(result.command).toBe('process');
    expect(result.job.status).toBe('completed');
    expect(result.job.inputFile).toBe('take1.wav');
    expect(result.job.language).toBe('en');
    expect(result.job.stages.map((stage: { stage: string }) => stage.stage)).toEqual([
      'separation',
      'transcription',
    ]);
    expect(events.map((event: { message: string }) => event.message)).toEqual([
      'Processing audio file',
      'stage.spatialize.skipped',
      'Pipeline completed',
    ]);
  });

  it('shows a stored job', async () => {
    const output = captureJson();
    await runCli(['process', audioPath, '--json'], { createPipeline: pipelineFactory() });
    const jobId: string = output().result.job.jobId;

    const code = await runCli(['show', jobId, '--json'], { createPipeline: pipelineFactory() });

    expect(code).toBe(0);
    expect(output().result).toMatchObject({ command: 'show', job: { jobId, status: 'completed' } });
  });

  it('exits non-zero for failed jobs and unknown ids', async () => {
    const output = captureJson();
    const failing = pipelineFactory({
      separation: {
        version: 'v1',
        endpoint: 'fake',
        separate: async () => {
          throw new AdapterError('service down');
        },
      },
    });

    expect(await runCli(['process', audioPath, '--json'], { createPipeline: failing })).toBe(1);
    expect(output().result.job.error).toBe('separation stage failed (adapter): service down');

    expect(await runCli(['show', 'no-such-job', '--json'], { createPipeline: pipelineFactory() })).toBe(1);
    expect(output().result.error).toEqual({ message: 'Job not found: no-such-job', name: 'JobNotFoundError' });
  });

  it('rejects empty and oversized files before the pipeline runs', async () => {
    const output = captureJson();
    const pipeline = createPipeline(config());
    const processSpy = vi.spyOn(pipeline, 'process');
    const emptyPath = join(dataDir, 'empty.wav');
    await writeFile(emptyPath, '');
    const bigPath = join(dataDir, 'big.wav');
    await writeFile(bigPath, Buffer.alloc(2048));

    expect(await runCli(['process', emptyPath, '--json'], { createPipeline: () => pipeline })).toBe(1);
    expect(output().result.error).toEqual({ message: 'Uploaded file is empty', name: 'ValidationError' });

    expect(await runCli(['process', bigPath, '--json'], { createPipeline: () => pipeline })).toBe(1);
    expect(output().result.error).toEqual({
      message: 'Upload is 2048 bytes, over the 1024 byte limit',
      name: 'ValidationError',
    });
    expect(processSpy).not.toHaveBeenCalled();
  });

  it('reports usage errors through the exit code', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    expect(await runCli(['process'], { createPipeline: pipelineFactory() })).toBe(1);
  });
});
