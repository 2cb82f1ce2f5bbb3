// packages/api/src/transport/http-server.ts
//
// Fastify HTTP server exposing the pipeline:
// - POST /jobs                       -> upload audio and run the pipeline
// - GET /jobs/:jobId                 -> fetch the job record
// - GET /jobs/:jobId/artifact/:name  -> download one job artifact
import multipart from '@fastify/multipart';
import Fastify, { type FastifyInstance } from 'fastify';

import { createPipeline, type PipelineOrchestrator } from '@spatial-audio/orchestrator';

import { type ApiConfig, loadConfig } from '../config/env.js';
import { createPipelineLogger, logger } from '../infrastructure/logger.js';
import { registerCoreRoutes } from './core-routes.js';
import { generateRequestId, registerErrorHandler } from './error-handler.js';

export interface HttpServerOptions {
  config?: ApiConfig;
  pipeline?: PipelineOrchestrator;
}

export async function createHttpServer(options: HttpServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const pipeline =
    options.pipeline ?? createPipeline(config.pipeline, { logger: createPipelineLogger(logger) });

  const app = Fastify({
    logger: false,
    genReqId: generateRequestId,
  });

  registerErrorHandler(app);
  await app.register(multipart, {
    limits: {
      fileSize: config.pipeline.maxUploadBytes,
      files: 1,
    },
  });

  registerCoreRoutes(app, { pipeline });

  return app;
}

export async function startHttpServer(): Promise<void> {
  const config = loadConfig();
  const app = await createHttpServer({ config });

  await app.listen({ port: config.httpPort, host: config.httpHost });

  logger.info('HTTP server started', {
    port: config.httpPort,
    host: config.httpHost,
    dataDir: config.pipeline.dataDir,
    spatializeEnabled: config.pipeline.spatialize.enabled,
  });
}
