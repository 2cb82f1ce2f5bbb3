import { readFile, stat } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { basename } from 'node:path';

import { Command, CommanderError } from 'commander';
import ora from 'ora';
import pc from 'picocolors';

import type { JobRecord, PipelineLogger, StageName } from '@spatial-audio/contracts';

import { loadPipelineConfig } from './config.js';
import { createLogger, toPipelineLogger, type Logger } from './logger.js';
import { createPipeline, type PipelineOrchestrator } from './pipeline.js';
import type { StageProgressEvent } from './types.js';
import { validateUpload } from './upload.js';

const require = createRequire(import.meta.url);
const { version: pkgVersion } = require('../package.json') as { version: string };

const stageLabels: Record<StageName, string> = {
  separation: 'Separating stems',
  transcription: 'Transcribing vocals',
  spatialize: 'Predicting word positions',
};

export interface CliDependencies {
  /** Builds the pipeline; defaults to the environment configuration. */
  createPipeline?: (logger: PipelineLogger) => PipelineOrchestrator;
  interactive?: boolean;
}

interface ProcessFlags {
  language?: string;
  spatialize: boolean;
  json: boolean;
  verbose: boolean;
}

interface ShowFlags {
  json: boolean;
}

function describeStage(record: JobRecord, stage: StageName): string {
  const result = record.stages.find((entry) => entry.stage === stage);
  if (!result) return pc.dim('not run');
  const cache = result.cacheHit ? pc.cyan('cache hit') : 'computed';
  switch (result.stage) {
    case 'separation':
      return `${cache}, ${result.payload.stems.length} stems${result.payload.extractedStem ? `, ${result.payload.extractedStem.artifact}` : ''}`;
    case 'transcription':
      return `${cache}, ${result.payload.words.length} words (${result.payload.language})`;
    case 'spatialize':
      return `${cache}, ${result.payload.positions.length} positions, ${result.payload.fallbackChunkCount} fallback chunks`;
  }
}

function printSummary(record: JobRecord): void {
  const status = record.status === 'completed' ? pc.green(record.status) : pc.red(record.status);
  console.log(`\n${pc.bold('Job')} ${record.jobId} ${status}`);
  console.log(`  input:         ${record.inputFile} ${pc.dim(record.inputDigest.slice(0, 12))}`);
  for (const stage of ['separation', 'transcription', 'spatialize'] as const) {
    console.log(`  ${`${stage}:`.padEnd(15)}${describeStage(record, stage)}`);
  }
  console.log(`  artifacts:     ${record.outputArtifacts.join(', ') || pc.dim('none')}`);
  if (record.error) console.log(`  ${pc.red('error:')}         ${record.error}`);
}

async function handleProcess(
  file: string,
  flags: ProcessFlags,
  logger: Logger,
  dependencies: CliDependencies,
): Promise<number> {
  const pipeline = (dependencies.createPipeline ?? defaultPipeline)(
    toPipelineLogger(logger, flags.verbose),
  );
  validateUpload((await stat(file)).size, pipeline.maxUploadBytes);
  const bytes = await readFile(file);
  logger.info('Processing audio file', {
    file,
    bytes: bytes.byteLength,
    language: flags.language ?? 'auto',
    spatialize: flags.spatialize && pipeline.spatializeEnabled,
  });

  const useFancy = !flags.json && (dependencies.interactive ?? Boolean(process.stdout.isTTY));
  const spinner = useFancy ? ora({ spinner: 'dots', color: 'cyan' }) : null;
  const onStage = (event: StageProgressEvent): void => {
    if (!spinner) return;
    const label = stageLabels[event.stage];
    switch (event.status) {
      case 'start':
        spinner.start(label);
        return;
      case 'success':
        spinner.succeed(event.detail?.cacheHit === true ? `${label} ${pc.dim('(cached)')}` : label);
        return;
      case 'failure':
        spinner.fail(label);
        return;
      case 'skipped':
        spinner.info(`${label} ${pc.dim('(skipped)')}`);
    }
  };

  const record = await pipeline.process(basename(file), bytes, flags.language, {
    spatialize: flags.spatialize,
    onStage,
  });
  if (spinner?.isSpinning) spinner.stop();

  if (record.status === 'completed') {
    logger.success('Pipeline completed', { jobId: record.jobId });
  } else {
    logger.error('Pipeline failed', { jobId: record.jobId, error: record.error });
  }
  if (!flags.json) printSummary(record);
  logger.flush({ command: 'process', job: record });
  return record.status === 'completed' ? 0 : 1;
}

async function handleShow(
  jobId: string,
  flags: ShowFlags,
  logger: Logger,
  dependencies: CliDependencies,
): Promise<number> {
  const pipeline = (dependencies.createPipeline ?? defaultPipeline)(toPipelineLogger(logger));
  const record = await pipeline.getJob(jobId);
  if (!flags.json) printSummary(record);
  logger.flush({ command: 'show', job: record });
  return 0;
}

function defaultPipeline(logger: PipelineLogger): PipelineOrchestrator {
  return createPipeline(loadPipelineConfig(), { logger });
}

/**
 * Run the CLI against `argv` (without the node and script entries) and
 * resolve to the process exit code.
 */
export async function runCli(argv: string[], dependencies: CliDependencies = {}): Promise<number> {
  const json = argv.includes('--json');
  const logger = createLogger({ json });
  let exitCode = 0;

  const program = new Command('spatial-pipeline')
    .description('Separate, transcribe and spatialize audio files')
    .version(pkgVersion, '-v, --version')
    .exitOverride()
    .showHelpAfterError();

  program
    .command('process')
    .description('Run the pipeline on an audio file')
    .argument('<file>', 'audio file to process')
    .option('-l, --language <code>', 'language hint for transcription')
    .option('--no-spatialize', 'skip the spatialize stage for this job')
    .option('--json', 'emit structured JSON output', false)
    .option('--verbose', 'print every pipeline event', false)
    .action(async (file: string, flags: ProcessFlags) => {
      exitCode = await handleProcess(file, flags, logger, dependencies);
    });

  program
    .command('show')
    .description('Print a stored job record')
    .argument('<jobId>', 'job identifier')
    .option('--json', 'emit structured JSON output', false)
    .action(async (jobId: string, flags: ShowFlags) => {
      exitCode = await handleShow(jobId, flags, logger, dependencies);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    const name = error instanceof Error ? error.name : 'Error';
    logger.error(message, { name });
    logger.flush({ error: { message, name } });
    return 1;
  }
}
