export {
  SpatialPositionSynthesizer,
  chunkWords,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONTEXT_WORDS,
  MIN_CHUNK_SIZE,
} from './synthesizer.js';
export {
  GeminiPositionPredictor,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GEMINI_BASE_URL,
  parseGenerateContent,
  stripCodeFences,
  type GeminiPositionPredictorOptions,
} from './gemini.js';
export {
  derivePosition,
  normalizePositionPi,
  toCartesian,
  toRadians,
  round4,
  clamp,
} from './coordinates.js';
export { deterministicPositionPi, FALLBACK_CONFIDENCE } from './fallback.js';
export { buildEffects, MIN_EFFECT_DURATION } from './effects.js';
export { wordsDigest } from './digest.js';
export type {
  ChunkPredictionRequest,
  IndexedWord,
  PositionAnchor,
  PositionPredictor,
  PredictedPosition,
  SpatialPrediction,
  SynthesizerOptions,
} from './types.js';
