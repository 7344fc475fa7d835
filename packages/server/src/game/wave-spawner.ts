// wave-spawner.ts
// Summary: Timed admission of hostile craft up to the level's target count, placing each one on a free
//          spawn cell away from other hostiles and from the pilot, with a faster retry after a failed scan.
// Structure: SpawnerState -> SpawnContext -> stepSpawner returning a tagged result.
// Usage: const result = stepSpawner(world.spawner, { ...world, target, random, nextId }, dt);
// ---------------------------------------------------------------------------

import { CARDINAL_HEADINGS, CRAFT, SPAWNER, type RandomSource } from '@wingmaze/shared';

import { createHostileCraft, type HostileCraft, type PlayerCraft } from './craft.js';
import { distance } from './geometry.js';
import { isPositionFree, type ObstacleField } from './obstacle-field.js';

export interface SpawnerState {
  timer: number;
}

export interface SpawnContext {
  readonly field: ObstacleField;
  readonly player: PlayerCraft;
  readonly hostiles: HostileCraft[];
  readonly target: number;
  readonly random: RandomSource;
  readonly nextId: () => string;
}

export type SpawnResult =
  | { readonly kind: 'at-capacity' }
  | { readonly kind: 'waiting' }
  | { readonly kind: 'spawned'; readonly hostile: HostileCraft }
  | { readonly kind: 'exhausted' };

export function createSpawnerState(): SpawnerState {
  return { timer: SPAWNER.delaySeconds };
}

export function stepSpawner(spawner: SpawnerState, context: SpawnContext, dt: number): SpawnResult {
  const { field, player, hostiles, random } = context;
  if (hostiles.length >= context.target) return { kind: 'at-capacity' };

  spawner.timer -= dt;
  if (spawner.timer > 0 || field.spawnCells.length === 0) return { kind: 'waiting' };

  for (let attempt = 0; attempt < SPAWNER.maxAttempts; attempt += 1) {
    const candidate = random.pick(field.spawnCells);
    if (!isPositionFree(field.cells, candidate, CRAFT.hostileRadius)) continue;
    if (hostiles.some((hostile) => distance(candidate, hostile.position) < SPAWNER.minHostileSpacing)) continue;
    if (distance(candidate, player.position) <= SPAWNER.minPlayerDistance) continue;

    const hostile = createHostileCraft(context.nextId(), candidate, random.pick(CARDINAL_HEADINGS));
    hostiles.push(hostile);
    spawner.timer = SPAWNER.delaySeconds;
    return { kind: 'spawned', hostile };
  }

  spawner.timer = SPAWNER.delaySeconds / 2;
  return { kind: 'exhausted' };
}
