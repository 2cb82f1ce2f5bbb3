import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { ApiConfig } from '../src/config/env.js';
import { createHttpServer } from '../src/transport/http-server.js';

/**
 * Black-box tests of the HTTP contract against the real routes and a real
 * pipeline wired with placeholder adapters under a temp data directory.
 */

const BOUNDARY = '----spatial-test-boundary';

interface FormPart {
  name: string;
  filename?: string;
  content: string | Buffer;
}

function multipartBody(parts: FormPart[]): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`;
    const headers = [`--${BOUNDARY}`, `Content-Disposition: ${disposition}`];
    if (part.filename) headers.push('Content-Type: application/octet-stream');
    chunks.push(Buffer.from(`${headers.join('\r\n')}\r\n\r\n`));
    chunks.push(typeof part.content === 'string' ? Buffer.from(part.content) : part.content);
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));
  return Buffer.concat(chunks);
}

function testConfig(dataDir: string): ApiConfig {
  return {
    nodeEnv: 'test',
    httpPort: 8080,
    httpHost: '127.0.0.1',
    pipeline: {
      dataDir,
      maxUploadBytes: 64,
      separation: { version: 'v1', timeoutMs: 1000, stem: 'vocals' },
      transcription: { version: 'v1', timeoutMs: 1000 },
      spatialize: {
        enabled: false,
        model: 'test-model',
        timeoutMs: 1000,
        chunkSize: 24,
        contextWords: 8,
      },
    },
  };
}

describe('HTTP API', () => {
  let dataDir: string;
  let app: FastifyInstance;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'spatial-api-'));
    app = await createHttpServer({ config: testConfig(dataDir) });
  });

  afterEach(async () => {
    await app.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  function postJob(parts: FormPart[]) {
    return app.inject({
      method: 'POST',
      url: '/jobs',
      headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
      payload: multipartBody(parts),
    });
  }

  it('GET /health reports ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it('POST /jobs runs the pipeline and returns the job record', async () => {
    const res = await postJob([
      { name: 'file', filename: 'song.wav', content: 'fake audio' },
      { name: 'language', content: 'en' },
    ]);

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('completed');
    expect(body.inputFile).toBe('song.wav');
    expect(body.language).toBe('en');
    expect(body.stages.map((stage: { stage: string }) => stage.stage)).toEqual([
      'separation',
      'transcription',
    ]);
    expect(body.stages[1].payload.language).toBe('en');
    expect(body.outputArtifacts).toEqual(['separation.json', 'transcription.json', 'upload-song.wav']);
  });

  it('GET /jobs/:jobId returns the stored record', async () => {
    const created = (await postJob([{ name: 'file', filename: 'song.wav', content: 'fake audio' }])).json();

    const res = await app.inject({ method: 'GET', url: `/jobs/${created.jobId}` });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.jobId).toBe(created.jobId);
    expect(body.status).toBe('completed');
    expect(body.inputDigest).toBe(created.inputDigest);
    expect(body.outputArtifacts).toEqual(created.outputArtifacts);
  });

  it('GET /jobs/:jobId/artifact/:name serves json and binary artifacts', async () => {
    const created = (await postJob([{ name: 'file', filename: 'song.wav', content: 'fake audio' }])).json();

    const transcript = await app.inject({
      method: 'GET',
      url: `/jobs/${created.jobId}/artifact/transcription.json`,
    });
    expect(transcript.statusCode).toBe(200);
    expect(transcript.headers['content-type']).toMatch(/^application\/json/);
    expect(transcript.json()).toMatchObject({
      provider: 'placeholder',
      language: 'unknown',
      source: 'upload-song.wav',
    });

    const audio = await app.inject({
      method: 'GET',
      url: `/jobs/${created.jobId}/artifact/upload-song.wav`,
    });
    expect(audio.statusCode).toBe(200);
    expect(audio.headers['content-type']).toBe('application/octet-stream');
    expect(audio.body).toBe('fake audio');
  });

  it('returns 404 for unknown jobs and artifacts', async () => {
    const missingJob = await app.inject({ method: 'GET', url: '/jobs/no-such-job' });
    expect(missingJob.statusCode).toBe(404);
    expect(missingJob.json()).toMatchObject({
      error: 'not_found',
      message: 'Job not found: no-such-job',
      code: 'JobNotFoundError',
    });

    const created = (await postJob([{ name: 'file', filename: 'song.wav', content: 'fake audio' }])).json();
    const missingArtifact = await app.inject({
      method: 'GET',
      url: `/jobs/${created.jobId}/artifact/missing.bin`,
    });
    expect(missingArtifact.statusCode).toBe(404);
    expect(missingArtifact.json().message).toBe(`Artifact not found: ${created.jobId}/missing.bin`);

    const jobRecord = await app.inject({
      method: 'GET',
      url: `/jobs/${created.jobId}/artifact/job.json`,
    });
    expect(jobRecord.statusCode).toBe(404);
  });

  it('rejects an empty upload with 400', async () => {
    const res = await postJob([{ name: 'file', filename: 'empty.wav', content: '' }]);

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      error: 'validation_failed',
      message: 'Uploaded file is empty',
      code: 'empty_file',
    });
  });

  it('rejects a request without a file part', async () => {
    const res = await postJob([{ name: 'language', content: 'en' }]);

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'validation_failed', code: 'no_file' });
  });

  it('rejects a body that is not multipart', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/jobs',
      payload: { file: 'not-a-file' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'validation_failed', code: 'not_multipart' });
  });

  it('rejects a malformed language code', async () => {
    const res = await postJob([
      { name: 'file', filename: 'song.wav', content: 'fake audio' },
      { name: 'language', content: '!!' },
    ]);

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      error: 'validation_failed',
      message: 'language must be a language code such as "en"',
      code: 'invalid_string',
    });
  });

  it('rejects uploads over the size limit with 413', async () => {
    const res = await postJob([
      { name: 'file', filename: 'big.wav', content: Buffer.alloc(100, 1) },
    ]);

    expect(res.statusCode).toBe(413);
    expect(res.json()).toMatchObject({
      error: 'payload_too_large',
      code: 'FST_REQ_FILE_TOO_LARGE',
    });
  });
});
