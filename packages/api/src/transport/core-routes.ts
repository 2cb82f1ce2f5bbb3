import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ValidationError } from '@spatial-audio/contracts';
import { validateUpload, type PipelineOrchestrator } from '@spatial-audio/orchestrator';

import { logger } from '../infrastructure/logger.js';
import { resolveRoutePath } from './route-helpers.js';

export interface CoreRouteOptions {
  pipeline: PipelineOrchestrator;
}

const languageSchema = z
  .string()
  .trim()
  .min(1, 'language must not be empty')
  .max(16, 'language must be at most 16 characters')
  .regex(/^[A-Za-z]{2,3}([-_][A-Za-z0-9]+)*$/, 'language must be a language code such as "en"');

const jobParamsSchema = z.object({ jobId: z.string().min(1) });
const artifactParamsSchema = jobParamsSchema.extend({ name: z.string().min(1) });

interface UploadedFile {
  filename: string;
  bytes: Buffer;
}

export function registerCoreRoutes(app: FastifyInstance, options: CoreRouteOptions): void {
  const { pipeline } = options;

  app.get('/health', async () => ({ ok: true }));

  app.post('/jobs', async (request, reply) => {
    if (!request.isMultipart()) {
      throw new ValidationError('Expected a multipart/form-data upload', 'not_multipart');
    }

    let upload: UploadedFile | undefined;
    let language: string | undefined;
    for await (const part of request.parts()) {
      if (part.type === 'file') {
        if (part.fieldname !== 'file') {
          // drain so the parser can continue to the next part
          await part.toBuffer();
          continue;
        }
        upload = { filename: part.filename, bytes: await part.toBuffer() };
      } else if (part.fieldname === 'language' && typeof part.value === 'string') {
        language = part.value.trim() === '' ? undefined : languageSchema.parse(part.value);
      }
    }

    if (!upload) {
      throw new ValidationError('No file uploaded', 'no_file');
    }
    validateUpload(upload.bytes.length, pipeline.maxUploadBytes);

    const job = await pipeline.process(upload.filename, upload.bytes, language);

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: 'POST /jobs',
      statusCode: 200,
      jobId: job.jobId,
      jobStatus: job.status,
    });

    return reply.code(200).send(job);
  });

  app.get('/jobs/:jobId', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const job = await pipeline.getJob(jobId);

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: resolveRoutePath(request, 'GET /jobs/:jobId'),
      statusCode: 200,
      jobId,
    });

    return reply.send(job);
  });

  app.get('/jobs/:jobId/artifact/:name', async (request, reply) => {
    const { jobId, name } = artifactParamsSchema.parse(request.params);
    const bytes = await pipeline.readArtifact(jobId, name);

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: resolveRoutePath(request, 'GET /jobs/:jobId/artifact/:name'),
      statusCode: 200,
      jobId,
      artifact: name,
    });

    return reply
      .header(
        'content-type',
        name.toLowerCase().endsWith('.json') ? 'application/json' : 'application/octet-stream',
      )
      .send(bytes);
  });
}
