import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { PipelineLogEvent, PipelineLogger, PipelineMetrics } from '@spatial-audio/contracts';

import type { PipelineConfig } from '../src/config.js';
import { createPipeline } from '../src/pipeline.js';

describe('orchestrator observability', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'spatial-observe-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  const config = (): PipelineConfig => ({
    dataDir,
    maxUploadBytes: 1024,
    separation: { version: 'v1', timeoutMs: 1000, stem: 'vocals' },
    transcription: { version: 'v1', timeoutMs: 1000 },
    spatialize: {
      enabled: false,
      model: 'gemini-2.0-flash',
      timeoutMs: 1000,
      chunkSize: 24,
      contextWords: 8,
    },
  });

  it('emits stage events, cache metrics and durations', async () => {
    const logs: PipelineLogEvent[] = [];
    const timings: { metric: string; tags?: Record<string, string> }[] = [];
    const increments: { metric: string; tags?: Record<string, string> }[] = [];
    const logger: PipelineLogger = { log: (event) => logs.push(event) };
    const metrics: PipelineMetrics = {
      timing: (metric, _durationMs, tags) => timings.push({ metric, tags }),
      increment: (metric, _value, tags) => increments.push({ metric, tags }),
    };

    const pipeline = createPipeline(config(), { logger, metrics });
    const record = await pipeline.process('clip.mp3', new Uint8Array([1, 2, 3]));

    expect(logs.map((event) => event.message)).toEqual([
      'pipeline.process.start',
      'stage.separation.start',
      'stage.separation.success',
      'stage.transcription.start',
      'stage.transcription.success',
      'stage.spatialize.skipped',
      'pipeline.process.success',
    ]);
    expect(logs.every((event) => event.jobId === record.jobId)).toBe(true);
    expect(logs[2]?.detail).toMatchObject({ cacheHit: false, durationMs: expect.any(Number) });

    expect(increments).toContainEqual({ metric: 'spatial.pipeline.cache.miss', tags: { stage: 'separation' } });
    expect(increments).toContainEqual({ metric: 'spatial.pipeline.cache.miss', tags: { stage: 'transcription' } });
    expect(increments).toContainEqual({ metric: 'spatial.pipeline.process.success', tags: {} });
    expect(timings).toContainEqual({
      metric: 'spatial.pipeline.stage.duration_ms',
      tags: { stage: 'separation', status: 'success' },
    });

    increments.length = 0;
    await pipeline.process('clip.mp3', new Uint8Array([1, 2, 3]));
    expect(increments).toContainEqual({ metric: 'spatial.pipeline.cache.hit', tags: { stage: 'separation' } });
    expect(increments).toContainEqual({ metric: 'spatial.pipeline.cache.hit', tags: { stage: 'transcription' } });
  });

  it('uses the placeholder adapters when no service URLs are configured', async () => {
    const record = await createPipeline(config()).process('clip.mp3', new Uint8Array([7]), 'de');

    expect(record.status).toBe('completed');
    const [separation, transcription] = record.stages;
    expect(separation?.payload.provider).toBe('placeholder');
    expect(transcription?.stage === 'transcription' ? transcription.payload : null).toEqual({
      provider: 'placeholder',
      language: 'de',
      model: 'none',
      text: '',
      segments: [],
      words: [],
      source: 'upload-clip.mp3',
    });
  });

  it('falls back to deterministic positions when no Gemini key is configured', async () => {
    const logs: PipelineLogEvent[] = [];
    const enabled = config();
    enabled.spatialize.enabled = true;
    const pipeline = createPipeline(enabled, {
      logger: { log: (event) => logs.push(event) },
      transcription: {
        version: 'v1',
        endpoint: 'fake',
        transcribe: async () => ({
          provider: 'fake',
          language: 'en',
          text: 'hello',
          segments: [],
          words: [{ word: 'hello', start: 0, end: 0.5 }],
        }),
      },
    });

    const record = await pipeline.process('clip.mp3', new Uint8Array([9]));

    const spatial = record.stages[2];
    expect(spatial?.stage === 'spatialize' ? spatial.payload.fallbackChunkCount : null).toBe(1);
    expect(spatial?.stage === 'spatialize' ? spatial.payload.model : null).toBe('gemini-2.0-flash');
    const fallbackLog = logs.find((event) => event.message === 'spatialize.chunk.fallback');
    expect(fallbackLog?.level).toBe('warn');
    expect(fallbackLog?.detail?.error).toBe('GEMINI_API_KEY (or GOOGLE_API_KEY) is not configured');
  });
});
