// helpers.ts
// Summary: Test fixtures shared by the simulation tests: scripted random sources and canned fields.
// Usage: import { scriptedRandom, borderField } from './helpers.js';
// ---------------------------------------------------------------------------

import { randomFromGenerator, type RandomSource } from '@wingmaze/shared';

import { createObstacleField, generateObstacleField, type ObstacleField } from '../src/game/obstacle-field.js';

/**
 * Replays `values` in order. Once exhausted it either wraps around (`cycle`) or keeps returning
 * `fallback`.
 */
export function scriptedRandom(
  values: readonly number[],
  options: { cycle?: boolean; fallback?: number } = {}
): RandomSource {
  let index = 0;
  return randomFromGenerator(() => {
    if (index < values.length) {
      const value = values[index];
      index += 1;
      return value;
    }
    if (options.cycle && values.length > 0) {
      index = 1;
      return values[0];
    }
    return options.fallback ?? 0;
  });
}

/** Closed 800x600 border with no interior clusters. Draws nothing from the random source. */
export function borderField(): ObstacleField {
  return generateObstacleField({ obstacleCount: 0, random: scriptedRandom([]) });
}

/** Open 800x600 field with no cells at all. */
export function openField(): ObstacleField {
  return createObstacleField([]);
}
