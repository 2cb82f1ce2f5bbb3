import { noopLogger, type PipelineLogger, type WordPosition, type WordTiming } from '@spatial-audio/contracts';

import { derivePosition, normalizeConfidence } from './coordinates.js';
import { buildEffects } from './effects.js';
import { deterministicWordPosition } from './fallback.js';
import type {
  IndexedWord,
  PositionAnchor,
  PositionPredictor,
  PredictedPosition,
  SpatialPrediction,
  SynthesizerOptions,
  WordChunk,
} from './types.js';

export const MIN_CHUNK_SIZE = 12;
export const DEFAULT_CHUNK_SIZE = 24;
export const DEFAULT_CONTEXT_WORDS = 8;
export const MAX_PREVIOUS_ANCHORS = 4;

export function chunkWords(words: IndexedWord[], chunkSize: number): WordChunk[] {
  const chunks: WordChunk[] = [];
  for (let start = 0; start < words.length; start += chunkSize) {
    chunks.push({
      words: words.slice(start, start + chunkSize),
      chunkIndex: chunks.length,
      totalChunks: 0,
    });
  }
  for (const chunk of chunks) {
    chunk.totalChunks = chunks.length;
  }
  return chunks;
}

function toAnchor(position: WordPosition): PositionAnchor {
  return {
    index: position.index,
    word: position.word,
    azimuthPi: position.positionPi.azimuthPi,
    elevationPi: position.positionPi.elevationPi,
    distance: position.positionPi.distance,
  };
}

export class SpatialPositionSynthesizer {
  readonly chunkSize: number;
  readonly contextWords: number;
  private readonly logger: PipelineLogger;

  constructor(
    private readonly predictor: PositionPredictor,
    options: SynthesizerOptions = {},
  ) {
    this.chunkSize = Math.max(MIN_CHUNK_SIZE, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));
    this.contextWords = Math.max(0, Math.floor(options.contextWords ?? DEFAULT_CONTEXT_WORDS));
    this.logger = options.logger ?? noopLogger;
  }

  get provider(): string {
    return this.predictor.provider;
  }

  get model(): string {
    return this.predictor.model;
  }

  async predict(words: WordTiming[], language?: string): Promise<SpatialPrediction> {
    const result: SpatialPrediction = {
      positions: [],
      effects: [],
      fallbackChunkCount: 0,
      chunkSize: this.chunkSize,
      contextWords: this.contextWords,
    };
    if (words.length === 0) return result;

    const indexed: IndexedWord[] = words.map((word, index) => ({
      index,
      word: word.word,
      start: word.start,
      end: word.end,
      score: word.score,
    }));

    for (const chunk of chunkWords(indexed, this.chunkSize)) {
      const first = chunk.words[0]?.index ?? 0;
      const afterLast = first + chunk.words.length;
      const request = {
        targets: chunk.words,
        contextBefore: indexed.slice(Math.max(0, first - this.contextWords), first),
        contextAfter: indexed.slice(afterLast, afterLast + this.contextWords),
        previousAnchors: result.positions.slice(-MAX_PREVIOUS_ANCHORS).map(toAnchor),
        language,
      };

      let rows: PredictedPosition[];
      try {
        rows = await this.predictor.predictChunk(request);
      } catch (error: unknown) {
        result.fallbackChunkCount += 1;
        this.logger.log({
          level: 'warn',
          message: 'spatialize.chunk.fallback',
          stage: 'spatialize',
          detail: {
            chunkIndex: chunk.chunkIndex,
            totalChunks: chunk.totalChunks,
            words: chunk.words.length,
            error: error instanceof Error ? error.message : String(error),
          },
        });
        for (const word of chunk.words) {
          result.positions.push(deterministicWordPosition(word, indexed.length));
        }
        continue;
      }

      result.positions.push(...this.mergeChunk(chunk, rows, indexed.length));
    }

    result.effects = buildEffects(result.positions);
    return result;
  }

  private mergeChunk(chunk: WordChunk, rows: PredictedPosition[], totalWords: number): WordPosition[] {
    const first = chunk.words[0]?.index ?? 0;
    const slots = Array.from<PredictedPosition | undefined>({ length: chunk.words.length });
    for (const row of rows) {
      const offset = row.index - first;
      if (offset >= 0 && offset < slots.length) {
        slots[offset] = row;
      }
    }

    return chunk.words.map((word, offset): WordPosition => {
      const row = slots[offset];
      if (!row) {
        return deterministicWordPosition(word, totalWords);
      }
      return {
        ...word,
        ...derivePosition(row),
        confidence: normalizeConfidence(row.confidence),
        method: 'gemini',
      };
    });
  }
}
