import { z } from 'zod';

import { AdapterError, ConfigurationError, MalformedResponseError } from '@spatial-audio/contracts';

import type {
  ChunkPredictionRequest,
  PositionPredictor,
  PredictedPosition,
} from './types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_CONFIDENCE = 0.5;

export interface GeminiPositionPredictorOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImplementation?: typeof fetch;
}

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).min(1),
        }),
      }),
    )
    .min(1),
});

const predictionSchema = z.object({
  positions: z
    .array(
      z.object({
        index: z.number().int(),
        azimuthPi: z.number(),
        elevationPi: z.number(),
        distance: z.number(),
        confidence: z.number().optional(),
      }),
    )
    .min(1),
});

export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```[a-zA-Z0-9_-]*\n/, '').replace(/\n```$/, '');
  }
  return cleaned.trim();
}

export function buildPrompt(request: ChunkPredictionRequest): Record<string, unknown> {
  return {
    task: 'Predict a spatial audio position for every target lyric word for immersive ambisonic playback.',
    rules: [
      'Return valid JSON only.',
      'Include exactly one output object for every target index and preserve the index values.',
      'azimuthPi is the azimuth divided by pi, in [0,2).',
      'elevationPi is the polar angle divided by pi, in [0,1]; 0.5 is ear level.',
      'distance is in [0.25,3.0].',
      'confidence is in [0,1].',
      'Context words and previous anchors are for continuity only; do not output them.',
    ],
    language: request.language ?? null,
    previousAnchors: request.previousAnchors,
    contextBefore: request.contextBefore,
    targetWords: request.targets,
    contextAfter: request.contextAfter,
    outputSchema: {
      positions: [{ index: 0, azimuthPi: 0.5, elevationPi: 0.5, distance: 1.0, confidence: 0.8 }],
    },
  };
}

export class GeminiPositionPredictor implements PositionPredictor {
  readonly provider = 'gemini-lyrics';
  readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GeminiPositionPredictorOptions = {}) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.baseUrl = (options.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
  }

  async predictChunk(request: ChunkPredictionRequest): Promise<PredictedPosition[]> {
    if (!this.apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY (or GOOGLE_API_KEY) is not configured');
    }

    const url = new URL(`${this.baseUrl}/models/${this.model}:generateContent`);
    url.searchParams.set('key', this.apiKey);

    const body = {
      contents: [{ role: 'user', parts: [{ text: JSON.stringify(buildPrompt(request)) }] }],
      generationConfig: {
        temperature: 0.2,
        responseMimeType: 'application/json',
      },
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    timeoutId.unref?.();

    let raw: unknown;
    try {
      const response = await this.fetchImpl(url.toString(), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new AdapterError(
          `Gemini generateContent failed (${response.status} ${response.statusText}): ${errorText}`,
          { status: response.status },
        );
      }
      raw = await response.json();
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new AdapterError(`Gemini request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      if (error instanceof AdapterError) throw error;
      throw new AdapterError(
        `Gemini request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }

    return parseGenerateContent(raw);
  }
}

export function parseGenerateContent(raw: unknown): PredictedPosition[] {
  const envelope = generateContentSchema.safeParse(raw);
  if (!envelope.success) {
    throw new MalformedResponseError('Gemini response has no candidate content');
  }
  const text = envelope.data.candidates[0]?.content.parts[0]?.text ?? '';
  if (!text) {
    throw new MalformedResponseError('Gemini returned empty content');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch (error: unknown) {
    throw new MalformedResponseError('Gemini content is not valid JSON', { cause: error });
  }

  const prediction = predictionSchema.safeParse(parsed);
  if (!prediction.success) {
    throw new MalformedResponseError(
      `Gemini response missing positions: ${prediction.error.issues[0]?.message ?? 'invalid shape'}`,
    );
  }

  return prediction.data.positions.map((row) => ({
    index: row.index,
    azimuthPi: row.azimuthPi,
    elevationPi: row.elevationPi,
    distance: row.distance,
    confidence: row.confidence ?? DEFAULT_CONFIDENCE,
  }));
}
