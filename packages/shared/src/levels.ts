// levels.ts
// Summary: Level table model describing game progression plus the reference four-level configuration.
// Structure: LevelDescriptor interface -> DEFAULT_LEVELS -> isRecord guard -> sanitizeLevelTable for untrusted
//            JSON input.
// Usage: const levels = sanitizeLevelTable(JSON.parse(text)); levels[index].timeLimit
// ---------------------------------------------------------------------------

import { CRAFT } from './constants.js';

export interface LevelDescriptor {
  readonly obstacleCount: number;
  readonly hostileTarget: number;
  readonly timeLimit: number;
}

export const DEFAULT_LEVELS: readonly LevelDescriptor[] = [
  { obstacleCount: 3, hostileTarget: 3, timeLimit: 30 },
  { obstacleCount: 4, hostileTarget: 4, timeLimit: 40 },
  { obstacleCount: 5, hostileTarget: 5, timeLimit: 50 },
  { obstacleCount: 6, hostileTarget: 6, timeLimit: 60 }
];

/** Narrows untrusted JSON or message payloads to a plain keyed object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNonNegativeInteger(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return null;
  return Math.floor(value);
}

function sanitizeLevel(entry: unknown, maxHostiles: number): LevelDescriptor | null {
  if (!isRecord(entry)) return null;
  const obstacleCount = toNonNegativeInteger(entry.obstacleCount);
  const hostileTarget = toNonNegativeInteger(entry.hostileTarget);
  const timeLimit = toNonNegativeInteger(entry.timeLimit);
  if (obstacleCount === null || hostileTarget === null || timeLimit === null || timeLimit === 0) {
    return null;
  }
  return { obstacleCount, hostileTarget: Math.min(hostileTarget, maxHostiles), timeLimit };
}

/**
 * Accepts either `{ levels: [...] }` or a bare array. Entries that are not objects with non-negative
 * numeric fields (and a positive time limit) are dropped; an empty result falls back to DEFAULT_LEVELS.
 */
export function sanitizeLevelTable(raw: unknown, maxHostiles: number = CRAFT.maxHostiles): LevelDescriptor[] {
  let list: unknown[] = [];
  if (Array.isArray(raw)) {
    list = raw;
  } else if (isRecord(raw) && Array.isArray(raw.levels)) {
    list = raw.levels;
  }
  const levels: LevelDescriptor[] = [];
  for (const entry of list) {
    const level = sanitizeLevel(entry, maxHostiles);
    if (level) levels.push(level);
  }
  return levels.length > 0 ? levels : DEFAULT_LEVELS.map((level) => ({ ...level }));
}
