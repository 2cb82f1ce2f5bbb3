import type { PositionPi, WordPosition } from '@spatial-audio/contracts';

import { clamp, derivePosition } from './coordinates.js';
import type { IndexedWord } from './types.js';

export const FALLBACK_CONFIDENCE = 0.45;

/**
 * Closed-form curve over the word's fractional position in the whole transcript:
 * one full azimuth turn, a gentle elevation wave and a faster distance wave.
 */
export function deterministicPositionPi(index: number, totalWords: number): PositionPi {
  const frac = index / Math.max(1, totalWords - 1);
  return {
    azimuthPi: (2 * frac) % 2,
    elevationPi: clamp(0.5 + 0.18 * Math.sin(2 * Math.PI * frac), 0, 1),
    distance: clamp(1 + 0.2 * Math.sin(4 * Math.PI * frac), 0.45, 2.5),
  };
}

export function deterministicWordPosition(word: IndexedWord, totalWords: number): WordPosition {
  return {
    ...word,
    ...derivePosition(deterministicPositionPi(word.index, totalWords)),
    confidence: FALLBACK_CONFIDENCE,
    method: 'deterministic-fallback',
  };
}
