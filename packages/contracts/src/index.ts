export type JobStatus = 'completed' | 'failed';

export type StageName = 'separation' | 'transcription' | 'spatialize';

export interface StemReference {
  name: string;
  uri: string | null;
}

export interface BlobArtifact {
  artifact: string;
  bytes: number;
  sha256: string;
}

export interface SeparationPayload {
  provider: string;
  model?: string;
  stems: StemReference[];
  archive: BlobArtifact | null;
  extractedStem: (BlobArtifact & { name: string }) | null;
}

export interface WordTiming {
  word: string;
  start?: number;
  end?: number;
  score?: number;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface TranscriptionPayload {
  provider: string;
  language: string;
  model?: string;
  text: string;
  segments: TranscriptSegment[];
  words: WordTiming[];
  /** Artifact the transcript was computed from: the extracted stem or the raw upload. */
  source: string;
}

export interface PositionPi {
  azimuthPi: number;
  elevationPi: number;
  distance: number;
}

export interface PositionRad {
  azimuth: number;
  elevation: number;
  distance: number;
}

export interface PositionXyz {
  x: number;
  y: number;
  z: number;
}

export type PositionMethod = 'gemini' | 'deterministic-fallback';

export interface WordPosition extends WordTiming {
  index: number;
  positionPi: PositionPi;
  positionRad: PositionRad;
  positionXyz: PositionXyz;
  confidence: number;
  method: PositionMethod;
}

export interface EffectEndpoint {
  pi: PositionPi;
  radians: PositionRad;
}

export interface AmbisonicEffect {
  start: number;
  end: number;
  effect: {
    type: 'move';
    from: EffectEndpoint;
    to: EffectEndpoint;
  };
  metadata: {
    index: number;
    word: string;
    confidence: number;
    method: PositionMethod;
  };
}

export interface SpatializePayload {
  provider: string;
  model: string;
  language: string | null;
  wordCount: number;
  chunkSize: number;
  contextWords: number;
  fallbackChunkCount: number;
  positions: WordPosition[];
  effects: AmbisonicEffect[];
}

export type StageResult =
  | { stage: 'separation'; cacheHit: boolean; payload: SeparationPayload }
  | { stage: 'transcription'; cacheHit: boolean; payload: TranscriptionPayload }
  | { stage: 'spatialize'; cacheHit: boolean; payload: SpatializePayload };

export type StagePayload<S extends StageName> = Extract<StageResult, { stage: S }>['payload'];

export interface JobRecord {
  jobId: string;
  status: JobStatus;
  createdAt: string;
  inputFile: string;
  inputDigest: string;
  language?: string;
  stages: StageResult[];
  outputArtifacts: string[];
  error?: string;
}

export * from './errors.js';
export * from './observability.js';
