import { describe, expect, it, vi } from 'vitest';

import { AdapterError, ConfigurationError, MalformedResponseError } from '@spatial-audio/contracts';

import { GeminiPositionPredictor, parseGenerateContent, stripCodeFences } from '../src/gemini.js';
import { SpatialPositionSynthesizer } from '../src/synthesizer.js';
import type { ChunkPredictionRequest } from '../src/types.js';

const request: ChunkPredictionRequest = {
  targets: [{ index: 0, word: 'hello', start: 0, end: 0.3 }],
  contextBefore: [],
  contextAfter: [{ index: 1, word: 'world', start: 0.3, end: 0.6 }],
  previousAnchors: [],
  language: 'en',
};

const candidateResponse = (text: string) => ({
  ok: true,
  status: 200,
  statusText: 'OK',
  json: async () => ({ candidates: [{ content: { parts: [{ text }] } }] }),
});

describe('stripCodeFences', () => {
  it('removes a fenced json block', () => {
    expect(stripCodeFences('```json\n{"positions":[]}\n```')).toBe('{"positions":[]}');
    expect(stripCodeFences('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe('GeminiPositionPredictor', () => {
  it('posts the prompt to generateContent and parses fenced JSON', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      candidateResponse(
        '```json\n{"positions":[{"index":0,"azimuthPi":0.5,"elevationPi":0.5,"distance":1.2}]}\n```',
      ),
    );
    const predictor = new GeminiPositionPredictor({
      apiKey: 'test-key',
      model: 'test-model',
      baseUrl: 'https://gen.test/v1beta/',
      fetchImplementation: fetchMock,
    });

    const rows = await predictor.predictChunk(request);

    expect(rows).toEqual([{ index: 0, azimuthPi: 0.5, elevationPi: 0.5, distance: 1.2, confidence: 0.5 }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('https://gen.test/v1beta/models/test-model:generateContent?key=test-key');
    expect(init.method).toBe('POST');
    const body = JSON.parse(String(init.body)) as {
      generationConfig: { temperature: number; responseMimeType: string };
      contents: { parts: { text: string }[] }[];
    };
    expect(body.generationConfig).toEqual({ temperature: 0.2, responseMimeType: 'application/json' });
    const prompt = JSON.parse(body.contents[0]!.parts[0]!.text) as Record<string, unknown>;
    expect(prompt.targetWords).toEqual(request.targets);
    expect(prompt.contextAfter).toEqual(request.contextAfter);
    expect(prompt.language).toBe('en');
  });

  it('rejects without calling out when no API key is configured', async () => {
    const fetchMock = vi.fn();
    const predictor = new GeminiPositionPredictor({ fetchImplementation: fetchMock });

    await expect(predictor.predictChunk(request)).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('wraps non-success responses in AdapterError', async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: false,
      status: 503,
      statusText: 'Service Unavailable',
      text: async () => 'busy',
    });
    const predictor = new GeminiPositionPredictor({ apiKey: 'test-key', fetchImplementation: fetchMock });

    const error = await predictor.predictChunk(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AdapterError);
    expect((error as AdapterError).status).toBe(503);
    expect((error as AdapterError).message).toBe(
      'Gemini generateContent failed (503 Service Unavailable): busy',
    );
  });

  it('wraps transport failures in AdapterError', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error('socket hang up'));
    const predictor = new GeminiPositionPredictor({ apiKey: 'test-key', fetchImplementation: fetchMock });

    await expect(predictor.predictChunk(request)).rejects.toThrow('Gemini request failed: socket hang up');
  });

  it('lets the synthesizer fall back when the key is missing', async () => {
    const synthesizer = new SpatialPositionSynthesizer(new GeminiPositionPredictor());

    const result = await synthesizer.predict([{ word: 'solo', start: 0, end: 1 }]);

    expect(result.fallbackChunkCount).toBe(1);
    expect(result.positions[0]?.method).toBe('deterministic-fallback');
  });
});

describe('parseGenerateContent', () => {
  const wrap = (text: string) => ({ candidates: [{ content: { parts: [{ text }] } }] });

  it('rejects content that is not JSON', () => {
    expect(() => parseGenerateContent(wrap('not json'))).toThrow(MalformedResponseError);
  });

  it('rejects an empty positions list', () => {
    expect(() => parseGenerateContent(wrap('{"positions":[]}'))).toThrow(MalformedResponseError);
  });

  it('rejects rows missing required fields', () => {
    expect(() =>
      parseGenerateContent(wrap('{"positions":[{"index":0,"azimuthPi":0.2,"elevationPi":0.5}]}')),
    ).toThrow(MalformedResponseError);
  });

  it('rejects envelopes without candidates', () => {
    expect(() => parseGenerateContent({ candidates: [] })).toThrow('Gemini response has no candidate content');
    expect(() => parseGenerateContent(wrap(''))).toThrow('Gemini returned empty content');
  });
});
