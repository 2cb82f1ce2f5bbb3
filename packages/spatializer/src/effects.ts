import type { AmbisonicEffect, EffectEndpoint, WordPosition } from '@spatial-audio/contracts';

import { round4 } from './coordinates.js';

export const MIN_EFFECT_DURATION = 0.01;

function endpoint(position: WordPosition): EffectEndpoint {
  return { pi: position.positionPi, radians: position.positionRad };
}

/**
 * One move effect per word, from its own position to the next word's position
 * (the last word moves to itself).
 *
 * A word without a start time begins where the timeline cursor stands; the cursor
 * only advances on real word end times, so runs of untimed words do not push
 * later effects away from the transcript's boundaries.
 */
export function buildEffects(positions: WordPosition[]): AmbisonicEffect[] {
  const effects: AmbisonicEffect[] = [];
  let cursor = 0;

  positions.forEach((current, i) => {
    const next = positions[i + 1] ?? current;
    const start = current.start ?? cursor;
    let end = current.end ?? start;
    if (!(end > start)) {
      end = round4(start + MIN_EFFECT_DURATION);
    }
    if (current.end !== undefined) {
      cursor = Math.max(cursor, current.end);
    }

    effects.push({
      start,
      end,
      effect: {
        type: 'move',
        from: endpoint(current),
        to: endpoint(next),
      },
      metadata: {
        index: current.index,
        word: current.word,
        confidence: current.confidence,
        method: current.method,
      },
    });
  });

  return effects;
}
