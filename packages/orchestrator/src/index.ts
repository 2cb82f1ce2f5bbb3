export { ContentCache, cacheKey, type CacheEnvelope, type CacheParams } from './cache.js';
export {
  JobStore,
  JOB_RECORD_FILE,
  UPLOAD_PREFIX,
  sanitizeArtifactName,
  uploadArtifactName,
  type ArtifactContent,
} from './job-store.js';
export {
  HttpSeparationAdapter,
  PlaceholderSeparationAdapter,
  STEM_NAMES,
  type AudioInput,
  type SeparationAdapter,
  type SeparationMetadata,
  type SeparationResult,
} from './adapters/separation.js';
export {
  HttpTranscriptionAdapter,
  PlaceholderTranscriptionAdapter,
  type Transcript,
  type TranscriptionAdapter,
} from './adapters/transcription.js';
export type { HttpAdapterOptions } from './adapters/http.js';
export { extractStem, type ExtractedStem } from './stems.js';
export { validateUpload } from './upload.js';
export { classifyFailure, runStage, type StageFailureKind, type StageOutcome } from './outcome.js';
export {
  PipelineOrchestrator,
  createPipeline,
  type PipelineDependencies,
  type PipelineOverrides,
} from './pipeline.js';
export {
  loadPipelineConfig,
  type AdapterEndpointConfig,
  type PipelineConfig,
  type SpatializeConfig,
} from './config.js';
export { jobRecordSchema } from './schemas.js';
export { createLogger, toPipelineLogger, type Logger, type LogEvent } from './logger.js';
export { runCli, type CliDependencies } from './cli.js';
export type {
  PipelineProgressCallbacks,
  ProcessOptions,
  StageProgressEvent,
  StageProgressStatus,
} from './types.js';
