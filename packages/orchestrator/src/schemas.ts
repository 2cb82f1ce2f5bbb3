import { z } from 'zod';

import type {
  AmbisonicEffect,
  JobRecord,
  SeparationPayload,
  SpatializePayload,
  TranscriptionPayload,
  WordPosition,
  WordTiming,
} from '@spatial-audio/contracts';

// Persisted documents (cache envelopes, job records). Upstream service
// responses are validated separately in the adapters.

const blobArtifactSchema = z.object({
  artifact: z.string(),
  bytes: z.number().int().nonnegative(),
  sha256: z.string(),
});

export const separationPayloadSchema: z.ZodType<SeparationPayload> = z.object({
  provider: z.string(),
  model: z.string().optional(),
  stems: z.array(z.object({ name: z.string(), uri: z.string().nullable() })),
  archive: blobArtifactSchema.nullable(),
  extractedStem: blobArtifactSchema.extend({ name: z.string() }).nullable(),
});

const wordTimingSchema: z.ZodType<WordTiming> = z.object({
  word: z.string(),
  start: z.number().optional(),
  end: z.number().optional(),
  score: z.number().optional(),
});

export const transcriptionPayloadSchema: z.ZodType<TranscriptionPayload> = z.object({
  provider: z.string(),
  language: z.string(),
  model: z.string().optional(),
  text: z.string(),
  segments: z.array(z.object({ start: z.number(), end: z.number(), text: z.string() })),
  words: z.array(wordTimingSchema),
  source: z.string(),
});

const positionPiSchema = z.object({
  azimuthPi: z.number(),
  elevationPi: z.number(),
  distance: z.number(),
});

const positionRadSchema = z.object({
  azimuth: z.number(),
  elevation: z.number(),
  distance: z.number(),
});

const methodSchema = z.enum(['gemini', 'deterministic-fallback']);

const wordPositionSchema: z.ZodType<WordPosition> = z.object({
  index: z.number().int().nonnegative(),
  word: z.string(),
  start: z.number().optional(),
  end: z.number().optional(),
  score: z.number().optional(),
  positionPi: positionPiSchema,
  positionRad: positionRadSchema,
  positionXyz: z.object({ x: z.number(), y: z.number(), z: z.number() }),
  confidence: z.number(),
  method: methodSchema,
});

const endpointSchema = z.object({ pi: positionPiSchema, radians: positionRadSchema });

const effectSchema: z.ZodType<AmbisonicEffect> = z.object({
  start: z.number(),
  end: z.number(),
  effect: z.object({ type: z.literal('move'), from: endpointSchema, to: endpointSchema }),
  metadata: z.object({
    index: z.number().int().nonnegative(),
    word: z.string(),
    confidence: z.number(),
    method: methodSchema,
  }),
});

export const spatializePayloadSchema: z.ZodType<SpatializePayload> = z.object({
  provider: z.string(),
  model: z.string(),
  language: z.string().nullable(),
  wordCount: z.number().int().nonnegative(),
  chunkSize: z.number().int().positive(),
  contextWords: z.number().int().nonnegative(),
  fallbackChunkCount: z.number().int().nonnegative(),
  positions: z.array(wordPositionSchema),
  effects: z.array(effectSchema),
});

const stageResultSchema = z.discriminatedUnion('stage', [
  z.object({ stage: z.literal('separation'), cacheHit: z.boolean(), payload: separationPayloadSchema }),
  z.object({ stage: z.literal('transcription'), cacheHit: z.boolean(), payload: transcriptionPayloadSchema }),
  z.object({ stage: z.literal('spatialize'), cacheHit: z.boolean(), payload: spatializePayloadSchema }),
]);

export const jobRecordSchema: z.ZodType<JobRecord> = z.object({
  jobId: z.string(),
  status: z.enum(['completed', 'failed']),
  createdAt: z.string(),
  inputFile: z.string(),
  inputDigest: z.string(),
  language: z.string().optional(),
  stages: z.array(stageResultSchema),
  outputArtifacts: z.array(z.string()),
  error: z.string().optional(),
});
