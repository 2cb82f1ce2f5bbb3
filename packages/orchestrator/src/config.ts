import { resolve } from 'node:path';

import { z } from 'zod';

import { ConfigurationError } from '@spatial-audio/contracts';
import {
  readBool,
  readFirstString,
  readInt,
  readString,
} from '@spatial-audio/shared-infrastructure';

export interface AdapterEndpointConfig {
  /** Base URL of the stage service; the placeholder adapter is used when unset. */
  url?: string;
  version: string;
  timeoutMs: number;
}

export interface SpatializeConfig {
  enabled: boolean;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
  chunkSize: number;
  contextWords: number;
}

export interface PipelineConfig {
  dataDir: string;
  maxUploadBytes: number;
  separation: AdapterEndpointConfig & { stem: string };
  transcription: AdapterEndpointConfig;
  spatialize: SpatializeConfig;
}

const urlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:/i.test(value), 'must be an http(s) URL');

const pipelineConfigSchema = z.object({
  dataDir: z.string().min(1),
  maxUploadBytes: z.number().int().positive(),
  separation: z.object({
    url: urlSchema.optional(),
    version: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    stem: z.string().min(1),
  }),
  transcription: z.object({
    url: urlSchema.optional(),
    version: z.string().min(1),
    timeoutMs: z.number().int().positive(),
  }),
  spatialize: z.object({
    enabled: z.boolean(),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    baseUrl: urlSchema.optional(),
    timeoutMs: z.number().int().positive(),
    chunkSize: z.number().int().positive(),
    contextWords: z.number().int().nonnegative(),
  }),
});

/**
 * Read the pipeline configuration from the environment once. Core components
 * receive the returned value; nothing below this reads process.env.
 */
export function loadPipelineConfig(): PipelineConfig {
  const candidate: PipelineConfig = {
    dataDir: resolve(readString('DATA_DIR', './data') ?? './data'),
    maxUploadBytes: readInt('MAX_UPLOAD_MB', 250) * 1024 * 1024,
    separation: {
      url: readString('SEPARATION_URL'),
      version: readString('SEPARATION_VERSION', 'v1') ?? 'v1',
      timeoutMs: readInt('SEPARATION_TIMEOUT_MS', 300_000),
      stem: readString('SEPARATION_STEM', 'vocals') ?? 'vocals',
    },
    transcription: {
      url: readString('TRANSCRIPTION_URL'),
      version: readString('TRANSCRIPTION_VERSION', 'v1') ?? 'v1',
      timeoutMs: readInt('TRANSCRIPTION_TIMEOUT_MS', 300_000),
    },
    spatialize: {
      enabled: readBool('SPATIALIZE_ENABLED', true),
      apiKey: readFirstString(['GEMINI_API_KEY', 'GOOGLE_API_KEY']),
      model: readString('GEMINI_MODEL', 'gemini-2.0-flash') ?? 'gemini-2.0-flash',
      baseUrl: readString('GEMINI_BASE_URL'),
      timeoutMs: readInt('GEMINI_TIMEOUT_MS', 60_000),
      chunkSize: readInt('SPATIAL_CHUNK_SIZE', 24),
      contextWords: readInt('SPATIAL_CONTEXT_WORDS', 8),
    },
  };

  const parsed = pipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid pipeline configuration at ${issue?.path.join('.') ?? '<root>'}: ${issue?.message ?? 'invalid value'}`,
      { cause: parsed.error },
    );
  }
  return candidate;
}
