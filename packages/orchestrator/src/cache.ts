import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

import type { z } from 'zod';

import { StorageError, type StageName } from '@spatial-audio/contracts';
import { canonicalJson, sha256Hex, type JsonValue } from '@spatial-audio/shared-infrastructure';

export type CacheParams = { [key: string]: JsonValue | undefined };

export interface CacheEnvelope<T> {
  cacheKey: string;
  cachedAt: string;
  payload: T;
}

const CACHE_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * `${stage}-${inputDigest}-${sha256(canonical params)}`. Identical for logically
 * identical params regardless of key order.
 */
export function cacheKey(stage: StageName, inputDigest: string, params: CacheParams): string {
  return `${stage}-${inputDigest}-${sha256Hex(canonicalJson(params))}`;
}

/**
 * Content-addressed store for stage outputs. JSON payloads live under
 * `responses/<key>.json`; large binary outputs under `blobs/<key>/<name>`.
 * No locking: concurrent writers of the same key overwrite each other.
 */
export class ContentCache {
  readonly responsesDir: string;
  readonly blobsDir: string;

  constructor(readonly rootDir: string) {
    this.responsesDir = join(rootDir, 'responses');
    this.blobsDir = join(rootDir, 'blobs');
  }

  /**
   * Cached payload for `key`, validated against `schema`; null on a miss.
   */
  async get<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const path = this.responsePath(key);
    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw new StorageError(`Failed to read cache entry ${key}`, { cause: error });
    }
    let envelope: unknown;
    try {
      envelope = JSON.parse(contents);
    } catch (error: unknown) {
      throw new StorageError(`Cache entry ${key} is not valid JSON`, { cause: error });
    }
    const payload =
      typeof envelope === 'object' && envelope !== null && 'payload' in envelope
        ? envelope.payload
        : undefined;
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new StorageError(
        `Cache entry ${key} does not match the stage payload: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
      );
    }
    return parsed.data;
  }

  async set<T>(key: string, payload: T): Promise<string> {
    const path = this.responsePath(key);
    const envelope: CacheEnvelope<T> = {
      cacheKey: key,
      cachedAt: new Date().toISOString(),
      payload,
    };
    try {
      await mkdir(this.responsesDir, { recursive: true });
      await writeFile(path, JSON.stringify(envelope, null, 2), 'utf8');
    } catch (error: unknown) {
      throw new StorageError(`Failed to write cache entry ${key}`, { cause: error });
    }
    return path;
  }

  async getBlobPath(key: string, name: string): Promise<string | null> {
    const path = this.blobPath(key, name);
    try {
      const stats = await stat(path);
      return stats.isFile() ? path : null;
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw new StorageError(`Failed to inspect cached blob ${key}/${name}`, { cause: error });
    }
  }

  async setBlob(key: string, name: string, bytes: Uint8Array): Promise<string> {
    const path = this.blobPath(key, name);
    try {
      await mkdir(join(this.blobsDir, key), { recursive: true });
      await writeFile(path, bytes);
    } catch (error: unknown) {
      throw new StorageError(`Failed to write cached blob ${key}/${name}`, { cause: error });
    }
    return path;
  }

  private responsePath(key: string): string {
    return join(this.responsesDir, `${assertKey(key)}.json`);
  }

  private blobPath(key: string, name: string): string {
    return join(this.blobsDir, assertKey(key), basename(name));
  }
}

function assertKey(key: string): string {
  if (!CACHE_KEY_PATTERN.test(key)) {
    throw new StorageError(`Invalid cache key: ${key}`);
  }
  return key;
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}
