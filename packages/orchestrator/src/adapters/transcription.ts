import { z } from 'zod';

import {
  MalformedResponseError,
  type TranscriptSegment,
  type WordTiming,
} from '@spatial-audio/contracts';

import { StageHttpClient, audioForm, type HttpAdapterOptions } from './http.js';
import type { AudioInput } from './separation.js';

export interface Transcript {
  provider: string;
  language: string;
  model?: string;
  text: string;
  segments: TranscriptSegment[];
  words: WordTiming[];
}

export interface TranscriptionAdapter {
  readonly version: string;
  readonly endpoint: string;
  transcribe(audio: AudioInput, language?: string): Promise<Transcript>;
}

const wordSchema = z
  .object({
    word: z.string(),
    start: z.number().nullish(),
    end: z.number().nullish(),
    score: z.number().nullish(),
  })
  .transform((row): WordTiming => {
    const word: WordTiming = { word: row.word };
    if (row.start != null) word.start = row.start;
    if (row.end != null) word.end = row.end;
    if (row.score != null) word.score = row.score;
    return word;
  });

const transcriptionResponseSchema = z.object({
  provider: z.string().min(1),
  language: z.string().min(1),
  model: z.string().optional(),
  text: z.string().default(''),
  segments: z
    .array(z.object({ start: z.number(), end: z.number(), text: z.string() }))
    .default([]),
  words: z.array(wordSchema).default([]),
});

export class HttpTranscriptionAdapter implements TranscriptionAdapter {
  readonly version: string;
  private readonly client: StageHttpClient;

  constructor(options: HttpAdapterOptions) {
    this.client = new StageHttpClient('Transcription', options);
    this.version = options.version ?? 'v1';
  }

  get endpoint(): string {
    return this.client.baseUrl;
  }

  async transcribe(audio: AudioInput, language?: string): Promise<Transcript> {
    const fields: Record<string, string> = language ? { language } : {};
    const raw = await this.client.postForm('transcribe', audioForm(audio.bytes, audio.filename, fields));
    const parsed = transcriptionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Transcription response is malformed: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }
}

export class PlaceholderTranscriptionAdapter implements TranscriptionAdapter {
  readonly version = 'placeholder-v1';
  readonly endpoint = 'placeholder';

  async transcribe(_audio: AudioInput, language?: string): Promise<Transcript> {
    return {
      provider: 'placeholder',
      language: language ?? 'unknown',
      model: 'none',
      text: '',
      segments: [],
      words: [],
    };
  }
}
