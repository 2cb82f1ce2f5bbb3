import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

import {
  ArtifactNotFoundError,
  JobNotFoundError,
  StorageError,
  type JobRecord,
} from '@spatial-audio/contracts';

import { errorCode, isNotFound } from './cache.js';
import { jobRecordSchema } from './schemas.js';

export const JOB_RECORD_FILE = 'job.json';
/** Uploads live under their own prefix so they never collide with stage artifacts. */
export const UPLOAD_PREFIX = 'upload-';
const JOB_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type ArtifactContent = Uint8Array | object | unknown[];

/**
 * Reduce a client supplied name to its last path component so it cannot escape
 * the job directory.
 */
export function sanitizeArtifactName(name: string): string {
  const safe = basename(name.replaceAll('\\', '/'));
  if (!safe || safe === '.' || safe === '..') {
    throw new StorageError(`Invalid artifact name: ${name}`);
  }
  return safe;
}

export function uploadArtifactName(filename: string): string {
  return `${UPLOAD_PREFIX}${sanitizeArtifactName(filename)}`;
}

export class JobStore {
  constructor(readonly rootDir: string) {}

  async createJob(): Promise<string> {
    const jobId = randomUUID();
    try {
      await mkdir(this.rootDir, { recursive: true });
      // exclusive: fails if the directory already exists
      await mkdir(this.jobDir(jobId));
    } catch (error: unknown) {
      throw new StorageError(`Failed to create job directory for ${jobId}`, { cause: error });
    }
    return jobId;
  }

  jobDir(jobId: string): string {
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new JobNotFoundError(jobId);
    }
    return join(this.rootDir, jobId);
  }

  async saveUpload(jobId: string, filename: string, content: Uint8Array): Promise<string> {
    return this.saveArtifact(jobId, uploadArtifactName(filename), content);
  }

  async saveArtifact(jobId: string, name: string, content: ArtifactContent): Promise<string> {
    const target = join(this.jobDir(jobId), sanitizeArtifactName(name));
    const data = content instanceof Uint8Array ? content : JSON.stringify(content, null, 2);
    try {
      await writeFile(target, data);
    } catch (error: unknown) {
      throw new StorageError(`Failed to write artifact ${name} for job ${jobId}`, { cause: error });
    }
    return target;
  }

  async copyArtifact(jobId: string, sourcePath: string, destName?: string): Promise<string> {
    const target = join(this.jobDir(jobId), sanitizeArtifactName(destName ?? basename(sourcePath)));
    try {
      await copyFile(sourcePath, target);
    } catch (error: unknown) {
      throw new StorageError(`Failed to copy ${sourcePath} into job ${jobId}`, { cause: error });
    }
    return target;
  }

  async listArtifacts(jobId: string): Promise<string[]> {
    const dir = this.jobDir(jobId);
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name !== JOB_RECORD_FILE)
        .map((entry) => entry.name)
        .sort();
    } catch (error: unknown) {
      if (isNotFound(error)) throw new JobNotFoundError(jobId, { cause: error });
      throw new StorageError(`Failed to list artifacts for job ${jobId}`, { cause: error });
    }
  }

  async saveJob(record: JobRecord): Promise<string> {
    const target = join(this.jobDir(record.jobId), JOB_RECORD_FILE);
    try {
      await writeFile(target, JSON.stringify(record, null, 2), 'utf8');
    } catch (error: unknown) {
      throw new StorageError(`Failed to write job record ${record.jobId}`, { cause: error });
    }
    return target;
  }

  async loadJob(jobId: string): Promise<JobRecord> {
    const path = join(this.jobDir(jobId), JOB_RECORD_FILE);
    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) throw new JobNotFoundError(jobId, { cause: error });
      throw new StorageError(`Failed to read job record ${jobId}`, { cause: error });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error: unknown) {
      throw new StorageError(`Job record ${jobId} is not valid JSON`, { cause: error });
    }
    const parsed = jobRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Job record ${jobId} is malformed`, { cause: parsed.error });
    }
    return parsed.data;
  }

  async readArtifact(jobId: string, name: string): Promise<Buffer> {
    const safeName = sanitizeArtifactName(name);
    if (safeName === JOB_RECORD_FILE) {
      throw new ArtifactNotFoundError(jobId, safeName);
    }
    const path = join(this.jobDir(jobId), safeName);
    try {
      return await readFile(path);
    } catch (error: unknown) {
      if (isNotFound(error) || errorCode(error) === 'EISDIR') {
        throw new ArtifactNotFoundError(jobId, safeName, { cause: error });
      }
      throw new StorageError(`Failed to read artifact ${safeName} for job ${jobId}`, { cause: error });
    }
  }
}
