import type {
  AmbisonicEffect,
  PipelineLogger,
  WordPosition,
  WordTiming,
} from '@spatial-audio/contracts';

/**
 * Word as sent to the predictor, carrying its index in the whole transcript.
 */
export interface IndexedWord extends WordTiming {
  index: number;
}

/**
 * Compact view of an already placed word, used to bias the next chunk.
 */
export interface PositionAnchor {
  index: number;
  word: string;
  azimuthPi: number;
  elevationPi: number;
  distance: number;
}

export interface ChunkPredictionRequest {
  targets: IndexedWord[];
  contextBefore: IndexedWord[];
  contextAfter: IndexedWord[];
  previousAnchors: PositionAnchor[];
  language?: string;
}

/**
 * Raw predictor row; values are normalised by the synthesizer.
 */
export interface PredictedPosition {
  index: number;
  azimuthPi: number;
  elevationPi: number;
  distance: number;
  confidence: number;
}

export interface PositionPredictor {
  readonly provider: string;
  readonly model: string;
  predictChunk(request: ChunkPredictionRequest): Promise<PredictedPosition[]>;
}

export interface WordChunk {
  words: IndexedWord[];
  chunkIndex: number;
  totalChunks: number;
}

export interface SynthesizerOptions {
  chunkSize?: number;
  contextWords?: number;
  logger?: PipelineLogger;
}

export interface SpatialPrediction {
  positions: WordPosition[];
  effects: AmbisonicEffect[];
  fallbackChunkCount: number;
  chunkSize: number;
  contextWords: number;
}

