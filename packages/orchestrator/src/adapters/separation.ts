import { z } from 'zod';

import { MalformedResponseError, type StemReference } from '@spatial-audio/contracts';

import { StageHttpClient, audioForm, type HttpAdapterOptions } from './http.js';

export interface AudioInput {
  filename: string;
  bytes: Uint8Array;
}

export interface SeparationMetadata {
  provider: string;
  model?: string;
  stems: StemReference[];
}

export interface SeparationResult {
  metadata: SeparationMetadata;
  /** Zip archive of the separated stems, when the service produces one. */
  stemsArchive?: Uint8Array;
}

export interface SeparationAdapter {
  readonly version: string;
  /** Identity of the upstream service; part of the cache key. */
  readonly endpoint: string;
  separate(audio: AudioInput): Promise<SeparationResult>;
}

export const STEM_NAMES = ['vocals', 'drums', 'bass', 'other'] as const;

const separationResponseSchema = z.object({
  provider: z.string().min(1),
  model: z.string().optional(),
  stems: z.array(z.object({ name: z.string().min(1), uri: z.string().nullable().default(null) })),
  archiveUrl: z.string().min(1).optional(),
});

export class HttpSeparationAdapter implements SeparationAdapter {
  readonly version: string;
  private readonly client: StageHttpClient;

  constructor(options: HttpAdapterOptions) {
    this.client = new StageHttpClient('Separation', options);
    this.version = options.version ?? 'v1';
  }

  get endpoint(): string {
    return this.client.baseUrl;
  }

  async separate(audio: AudioInput): Promise<SeparationResult> {
    const raw = await this.client.postForm('separate', audioForm(audio.bytes, audio.filename));
    const parsed = separationResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Separation response is malformed: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        { cause: parsed.error },
      );
    }

    const { archiveUrl, ...metadata } = parsed.data;
    const result: SeparationResult = { metadata };
    if (archiveUrl) {
      result.stemsArchive = await this.client.download(archiveUrl);
    }
    return result;
  }
}

/**
 * Stand-in used when no separation service is configured: names the stems
 * without producing any audio.
 */
export class PlaceholderSeparationAdapter implements SeparationAdapter {
  readonly version = 'placeholder-v1';
  readonly endpoint = 'placeholder';

  async separate(): Promise<SeparationResult> {
    return {
      metadata: {
        provider: 'placeholder',
        model: 'none',
        stems: STEM_NAMES.map((name) => ({ name, uri: null })),
      },
    };
  }
}
