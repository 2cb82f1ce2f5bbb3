import { basename, join } from 'node:path';

import {
  noopLogger,
  noopMetrics,
  type BlobArtifact,
  type JobRecord,
  type PipelineLogger,
  type PipelineMetrics,
  type SeparationPayload,
  type SpatializePayload,
  type StageName,
  type StageResult,
  type TranscriptionPayload,
} from '@spatial-audio/contracts';
import { sha256Hex } from '@spatial-audio/shared-infrastructure';
import {
  GeminiPositionPredictor,
  SpatialPositionSynthesizer,
  wordsDigest,
  type PositionPredictor,
} from '@spatial-audio/spatializer';

import {
  HttpSeparationAdapter,
  PlaceholderSeparationAdapter,
  type SeparationAdapter,
} from './adapters/separation.js';
import {
  HttpTranscriptionAdapter,
  PlaceholderTranscriptionAdapter,
  type TranscriptionAdapter,
} from './adapters/transcription.js';
import { ContentCache, cacheKey } from './cache.js';
import type { PipelineConfig } from './config.js';
import { JobStore, uploadArtifactName } from './job-store.js';
import { runStage, type StageOutcome } from './outcome.js';
import {
  separationPayloadSchema,
  spatializePayloadSchema,
  transcriptionPayloadSchema,
} from './schemas.js';
import { extractStem } from './stems.js';
import type { ProcessOptions, StageProgressStatus } from './types.js';

export const STEMS_ARCHIVE_NAME = 'stems.zip';
export const FALLBACK_UPLOAD_NAME = 'upload.bin';

export interface PipelineDependencies {
  cache: ContentCache;
  store: JobStore;
  separation: SeparationAdapter;
  transcription: TranscriptionAdapter;
  /** Null disables the spatialize stage. */
  synthesizer: SpatialPositionSynthesizer | null;
  /** Stem fed to transcription when separation yields an archive. */
  stem?: string;
  /** Upload size limit that callers check before `process`. */
  maxUploadBytes?: number;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
}

interface JobContext {
  jobId: string;
  inputFile: string;
  /** Job artifact holding the raw upload. */
  uploadArtifact: string;
  inputDigest: string;
  language?: string;
}

interface SeparationStage {
  result: StageResult;
  /** Job artifact transcription reads: the extracted stem or the upload. */
  source: string;
  /** Content digest of `source`, so transcripts of different audio never share a cache entry. */
  sourceDigest: string;
}

function uploadName(filename: string): string {
  const base = basename(filename.replaceAll('\\', '/'));
  return !base || base === '.' || base === '..' ? FALLBACK_UPLOAD_NAME : base;
}

function blobArtifact(artifact: string, bytes: Uint8Array): BlobArtifact {
  return { artifact, bytes: bytes.byteLength, sha256: sha256Hex(bytes) };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PipelineOrchestrator {
  private readonly cache: ContentCache;
  private readonly store: JobStore;
  private readonly separation: SeparationAdapter;
  private readonly transcription: TranscriptionAdapter;
  private readonly synthesizer: SpatialPositionSynthesizer | null;
  private readonly stem: string;
  readonly maxUploadBytes: number | undefined;
  private readonly logger: PipelineLogger;
  private readonly metrics: PipelineMetrics;

  constructor(dependencies: PipelineDependencies) {
    this.cache = dependencies.cache;
    this.store = dependencies.store;
    this.separation = dependencies.separation;
    this.transcription = dependencies.transcription;
    this.synthesizer = dependencies.synthesizer;
    this.stem = dependencies.stem ?? 'vocals';
    this.maxUploadBytes = dependencies.maxUploadBytes;
    this.logger = dependencies.logger ?? noopLogger;
    this.metrics = dependencies.metrics ?? noopMetrics;
  }

  get spatializeEnabled(): boolean {
    return this.synthesizer !== null;
  }

  async process(
    filename: string,
    bytes: Uint8Array,
    language?: string,
    options: ProcessOptions = {},
  ): Promise<JobRecord> {
    const startedAt = Date.now();
    const jobId = await this.store.createJob();
    const inputFile = uploadName(filename);
    const context: JobContext = {
      jobId,
      inputFile,
      uploadArtifact: uploadArtifactName(inputFile),
      inputDigest: sha256Hex(bytes),
      language,
    };
    const createdAt = new Date().toISOString();

    this.logger.log({
      level: 'info',
      message: 'pipeline.process.start',
      jobId,
      stage: 'pipeline',
      detail: { inputFile: context.inputFile, inputDigest: context.inputDigest, language },
    });

    const stageStartTimes = new Map<StageName, number>();
    const emitStage = (
      stage: StageName,
      status: StageProgressStatus,
      detail?: Record<string, unknown>,
    ) => {
      options.onStage?.({ stage, status, detail });
      if (status === 'start') {
        stageStartTimes.set(stage, Date.now());
        this.logger.log({ level: 'info', message: `stage.${stage}.start`, jobId, stage, detail });
        return;
      }

      const stageStartedAt = stageStartTimes.get(stage);
      stageStartTimes.delete(stage);
      const durationMs =
        stageStartedAt !== undefined ? Math.max(Date.now() - stageStartedAt, 0) : undefined;
      const detailWithDuration =
        durationMs !== undefined ? { ...(detail ?? {}), durationMs } : detail;

      this.logger.log({
        level: status === 'failure' ? 'error' : status === 'skipped' ? 'warn' : 'info',
        message: `stage.${stage}.${status}`,
        jobId,
        stage,
        detail: detailWithDuration,
      });
      if (durationMs !== undefined) {
        this.metrics.timing('spatial.pipeline.stage.duration_ms', durationMs, { stage, status });
      }
      this.metrics.increment(`spatial.pipeline.stage.${status}`, 1, { stage });
    };

    const stages: StageResult[] = [];

    const finish = async (failure?: string): Promise<JobRecord> => {
      const record: JobRecord = {
        jobId,
        status: failure ? 'failed' : 'completed',
        createdAt,
        inputFile: context.inputFile,
        inputDigest: context.inputDigest,
        stages,
        outputArtifacts: await this.store.listArtifacts(jobId),
      };
      if (language !== undefined) record.language = language;
      if (failure) record.error = failure;
      await this.store.saveJob(record);

      const durationMs = Math.max(Date.now() - startedAt, 0);
      const result = failure ? 'failure' : 'success';
      this.logger.log({
        level: failure ? 'error' : 'info',
        message: `pipeline.process.${result}`,
        jobId,
        stage: 'pipeline',
        detail: failure ? { durationMs, error: failure } : { durationMs, stages: stages.length },
      });
      this.metrics.timing('spatial.pipeline.process.duration_ms', durationMs, { result });
      this.metrics.increment(`spatial.pipeline.process.${result}`, 1, {});
      return record;
    };

    const run = async <T extends { result: StageResult }>(
      stage: StageName,
      body: () => Promise<T>,
    ): Promise<StageOutcome<T>> => {
      emitStage(stage, 'start');
      const outcome = await runStage(body);
      if (outcome.ok) {
        stages.push(outcome.value.result);
        emitStage(stage, 'success', { cacheHit: outcome.value.result.cacheHit });
      } else {
        emitStage(stage, 'failure', { kind: outcome.kind, error: outcome.message });
      }
      return outcome;
    };

    const saved = await runStage(() => this.store.saveUpload(jobId, inputFile, bytes));
    if (!saved.ok) {
      return finish(`upload failed (${saved.kind}): ${saved.message}`);
    }

    const separation = await run('separation', () => this.runSeparation(context));
    if (!separation.ok) {
      return finish(`separation stage failed (${separation.kind}): ${separation.message}`);
    }

    const transcription = await run('transcription', () =>
      this.runTranscription(context, separation.value),
    );
    if (!transcription.ok) {
      return finish(`transcription stage failed (${transcription.kind}): ${transcription.message}`);
    }

    const synthesizer = options.spatialize === false ? null : this.synthesizer;
    if (!synthesizer) {
      emitStage('spatialize', 'skipped', {
        reason: this.synthesizer ? 'disabled for this job' : 'spatialize disabled',
      });
      return finish();
    }

    const spatialize = await run('spatialize', () =>
      this.runSpatialize(context, transcription.value.payload, synthesizer),
    );
    if (!spatialize.ok) {
      return finish(`spatialize stage failed (${spatialize.kind}): ${spatialize.message}`);
    }

    return finish();
  }

  getJob(jobId: string): Promise<JobRecord> {
    return this.store.loadJob(jobId);
  }

  readArtifact(jobId: string, name: string): Promise<Buffer> {
    return this.store.readArtifact(jobId, name);
  }

  private recordCache(stage: StageName, hit: boolean): void {
    this.metrics.increment(`spatial.pipeline.cache.${hit ? 'hit' : 'miss'}`, 1, { stage });
  }

  private async runSeparation(context: JobContext): Promise<SeparationStage> {
    const key = cacheKey('separation', context.inputDigest, {
      version: this.separation.version,
      endpoint: this.separation.endpoint,
      stem: this.stem,
    });

    const cached = await this.cache.get(key, separationPayloadSchema);
    this.recordCache('separation', cached !== null);
    const payload = cached ?? (await this.separateFresh(context, key));
    if (cached) {
      await this.restoreSeparationBlobs(context, key, cached);
    }

    await this.store.saveArtifact(context.jobId, 'separation.json', payload);
    const result: StageResult = { stage: 'separation', cacheHit: cached !== null, payload };
    const stem = payload.extractedStem;
    if (stem && (await this.hasArtifact(context.jobId, stem.artifact))) {
      return { result, source: stem.artifact, sourceDigest: stem.sha256 };
    }
    return { result, source: context.uploadArtifact, sourceDigest: context.inputDigest };
  }

  private async separateFresh(context: JobContext, key: string): Promise<SeparationPayload> {
    const upload = await this.store.readArtifact(context.jobId, context.uploadArtifact);
    const separated = await this.separation.separate({ filename: context.inputFile, bytes: upload });

    let archive: BlobArtifact | null = null;
    let extractedStem: SeparationPayload['extractedStem'] = null;
    if (separated.stemsArchive) {
      await this.cache.setBlob(key, STEMS_ARCHIVE_NAME, separated.stemsArchive);
      await this.store.saveArtifact(context.jobId, STEMS_ARCHIVE_NAME, separated.stemsArchive);
      archive = blobArtifact(STEMS_ARCHIVE_NAME, separated.stemsArchive);
      extractedStem = await this.extractAndStoreStem(context, key, separated.stemsArchive);
    }

    const payload: SeparationPayload = {
      provider: separated.metadata.provider,
      stems: separated.metadata.stems,
      archive,
      extractedStem,
    };
    if (separated.metadata.model !== undefined) payload.model = separated.metadata.model;
    await this.cache.set(key, payload);
    return payload;
  }

  private async extractAndStoreStem(
    context: JobContext,
    key: string,
    archive: Uint8Array,
  ): Promise<NonNullable<SeparationPayload['extractedStem']>> {
    const stem = extractStem(archive, this.stem);
    const artifact = `stem-${stem.name}`;
    await this.cache.setBlob(key, artifact, stem.bytes);
    await this.store.saveArtifact(context.jobId, artifact, stem.bytes);
    return { name: this.stem, ...blobArtifact(artifact, stem.bytes) };
  }

  /**
   * Copy cached archive and stem blobs into the job directory. A stem blob that
   * no longer exists is re-extracted from the cached archive.
   */
  private async restoreSeparationBlobs(
    context: JobContext,
    key: string,
    payload: SeparationPayload,
  ): Promise<void> {
    let archiveArtifact: string | null = null;
    if (payload.archive) {
      const archivePath = await this.cache.getBlobPath(key, payload.archive.artifact);
      if (archivePath) {
        await this.store.copyArtifact(context.jobId, archivePath, payload.archive.artifact);
        archiveArtifact = payload.archive.artifact;
      }
    }

    if (!payload.extractedStem) return;
    const stemPath = await this.cache.getBlobPath(key, payload.extractedStem.artifact);
    if (stemPath) {
      await this.store.copyArtifact(context.jobId, stemPath, payload.extractedStem.artifact);
      return;
    }
    if (archiveArtifact) {
      const archive = await this.store.readArtifact(context.jobId, archiveArtifact);
      await this.extractAndStoreStem(context, key, archive);
      this.logger.log({
        level: 'info',
        message: 'stage.separation.stem_reextracted',
        jobId: context.jobId,
        stage: 'separation',
        detail: { artifact: payload.extractedStem.artifact },
      });
      return;
    }
    this.logger.log({
      level: 'warn',
      message: 'stage.separation.blob_missing',
      jobId: context.jobId,
      stage: 'separation',
      detail: { cacheKey: key, artifact: payload.extractedStem.artifact },
    });
  }

  private async hasArtifact(jobId: string, name: string): Promise<boolean> {
    const artifacts = await this.store.listArtifacts(jobId);
    return artifacts.includes(name);
  }

  private async runTranscription(
    context: JobContext,
    separation: SeparationStage,
  ): Promise<{ result: StageResult; payload: TranscriptionPayload }> {
    const { source, sourceDigest } = separation;
    const key = cacheKey('transcription', context.inputDigest, {
      version: this.transcription.version,
      endpoint: this.transcription.endpoint,
      language: context.language,
      sourceDigest,
    });

    const cached = await this.cache.get(key, transcriptionPayloadSchema);
    this.recordCache('transcription', cached !== null);
    let payload: TranscriptionPayload;
    if (cached) {
      payload = cached;
    } else {
      const audio = await this.store.readArtifact(context.jobId, source);
      const transcript = await this.transcription.transcribe(
        { filename: source === context.uploadArtifact ? context.inputFile : source, bytes: audio },
        context.language,
      );
      payload = { ...transcript, source };
      await this.cache.set(key, payload);
    }

    await this.store.saveArtifact(context.jobId, 'transcription.json', payload);
    return { result: { stage: 'transcription', cacheHit: cached !== null, payload }, payload };
  }

  private async runSpatialize(
    context: JobContext,
    transcript: TranscriptionPayload,
    synthesizer: SpatialPositionSynthesizer,
  ): Promise<{ result: StageResult }> {
    const language =
      context.language ?? (transcript.language !== 'unknown' ? transcript.language : undefined);
    const key = cacheKey('spatialize', context.inputDigest, {
      wordsDigest: wordsDigest(transcript.words),
      model: synthesizer.model,
      language,
      chunkSize: synthesizer.chunkSize,
      contextWords: synthesizer.contextWords,
    });

    const cached = await this.cache.get(key, spatializePayloadSchema);
    this.recordCache('spatialize', cached !== null);
    let payload: SpatializePayload;
    if (cached) {
      payload = cached;
    } else {
      const prediction = await synthesizer.predict(transcript.words, language);
      payload = {
        provider: synthesizer.provider,
        model: synthesizer.model,
        language: language ?? null,
        wordCount: transcript.words.length,
        chunkSize: prediction.chunkSize,
        contextWords: prediction.contextWords,
        fallbackChunkCount: prediction.fallbackChunkCount,
        positions: prediction.positions,
        effects: prediction.effects,
      };
      // degraded results are not cached so a later run can reach the predictor
      if (prediction.fallbackChunkCount === 0) {
        await this.cache.set(key, payload);
      }
    }

    await this.store.saveArtifact(context.jobId, 'spatialize.json', payload);
    return { result: { stage: 'spatialize', cacheHit: cached !== null, payload } };
  }
}

export interface PipelineOverrides {
  separation?: SeparationAdapter;
  transcription?: TranscriptionAdapter;
  predictor?: PositionPredictor;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  fetchImplementation?: typeof fetch;
}

/**
 * Wire a PipelineConfig into concrete components. Overrides replace the
 * adapters, predictor or observability sinks, mainly for tests and embedding.
 */
export function createPipeline(
  config: PipelineConfig,
  overrides: PipelineOverrides = {},
): PipelineOrchestrator {
  const logger = overrides.logger ?? noopLogger;
  const separation =
    overrides.separation ??
    (config.separation.url
      ? new HttpSeparationAdapter({
          baseUrl: config.separation.url,
          version: config.separation.version,
          timeoutMs: config.separation.timeoutMs,
          fetchImplementation: overrides.fetchImplementation,
        })
      : new PlaceholderSeparationAdapter());
  const transcription =
    overrides.transcription ??
    (config.transcription.url
      ? new HttpTranscriptionAdapter({
          baseUrl: config.transcription.url,
          version: config.transcription.version,
          timeoutMs: config.transcription.timeoutMs,
          fetchImplementation: overrides.fetchImplementation,
        })
      : new PlaceholderTranscriptionAdapter());

  const synthesizer = config.spatialize.enabled
    ? new SpatialPositionSynthesizer(
        overrides.predictor ??
          new GeminiPositionPredictor({
            apiKey: config.spatialize.apiKey,
            model: config.spatialize.model,
            baseUrl: config.spatialize.baseUrl,
            timeoutMs: config.spatialize.timeoutMs,
            fetchImplementation: overrides.fetchImplementation,
          }),
        {
          chunkSize: config.spatialize.chunkSize,
          contextWords: config.spatialize.contextWords,
          logger,
        },
      )
    : null;

  return new PipelineOrchestrator({
    cache: new ContentCache(join(config.dataDir, 'cache')),
    store: new JobStore(join(config.dataDir, 'jobs')),
    separation,
    transcription,
    synthesizer,
    stem: config.separation.stem,
    maxUploadBytes: config.maxUploadBytes,
    logger,
    metrics: overrides.metrics ?? noopMetrics,
  });
}
