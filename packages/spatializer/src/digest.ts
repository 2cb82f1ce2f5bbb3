import type { WordTiming } from '@spatial-audio/contracts';
import { canonicalJson, sha256Hex } from '@spatial-audio/shared-infrastructure';

/**
 * Digest of the transcript word list; keys the spatialize cache independently
 * of the audio digest.
 */
export function wordsDigest(words: WordTiming[]): string {
  return sha256Hex(
    canonicalJson(
      words.map((w) => ({ word: w.word, start: w.start, end: w.end, score: w.score })),
    ),
  );
}
