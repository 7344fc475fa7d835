// world.ts
// Summary: Level world container and the ordered per-tick simulation pipeline that moves the pilot and
//          hostiles, advances projectiles, admits new hostiles and resolves combat.
// Structure: IdSequence -> LevelWorld -> createLevelWorld -> stepWorld.
// Usage: const world = createLevelWorld(level, random, ids); const result = stepWorld(world, input, dt, deps, events);
// ---------------------------------------------------------------------------

import {
  CRAFT,
  type LevelDescriptor,
  type RandomSource,
  type SimulationEvent
} from '@wingmaze/shared';

import { resolveCombat, type CombatOutcome, type CombatParticipants } from './combat.js';
import { advanceCraft, createPlayerCraft, firePlayer, tickWeapon, type PlayerCraft } from './craft.js';
import { tryHostileFire, updateHostileAi } from './hostile-ai.js';
import { findSpawnPosition, generateObstacleField, type ObstacleField } from './obstacle-field.js';
import { advanceProjectiles, type Projectile } from './projectiles.js';
import { createSpawnerState, stepSpawner, type SpawnerState } from './wave-spawner.js';

/** Monotonic id source so entity ids stay unique across levels within a session. */
export class IdSequence {
  private counter = 0;

  next(prefix: string): string {
    this.counter += 1;
    return `${prefix}-${this.counter}`;
  }
}

export interface LevelWorld extends CombatParticipants {
  readonly field: ObstacleField;
  readonly player: PlayerCraft;
  readonly spawner: SpawnerState;
  readonly hostileTarget: number;
}

export interface WorldStepInput {
  readonly fireHeld: boolean;
}

export interface WorldStepDependencies {
  readonly random: RandomSource;
  readonly ids: IdSequence;
}

export interface WorldStepResult {
  readonly playerShot: Projectile | null;
  readonly outcome: CombatOutcome;
}

export type FieldFactory = (level: LevelDescriptor, random: RandomSource) => ObstacleField;

export const generateLevelField: FieldFactory = (level, random) =>
  generateObstacleField({ obstacleCount: level.obstacleCount, random });

/** Fresh world for a level: new field, pilot at (or near) the field centre, no hostiles or shots. */
export function createLevelWorld(
  level: LevelDescriptor,
  random: RandomSource,
  ids: IdSequence,
  fieldFactory: FieldFactory = generateLevelField
): LevelWorld {
  const field = fieldFactory(level, random);
  const center = { x: Math.floor(field.width / 2), y: Math.floor(field.height / 2) };
  const spawn = findSpawnPosition(field, center, CRAFT.playerRadius);
  return {
    field,
    player: createPlayerCraft(ids.next('pilot'), spawn),
    hostiles: [],
    friendlyProjectiles: [],
    hostileProjectiles: [],
    spawner: createSpawnerState(),
    hostileTarget: Math.min(level.hostileTarget, CRAFT.maxHostiles)
  };
}

/**
 * One Playing tick after the timer check: pilot, hostiles, friendly then hostile projectiles, spawner,
 * and finally combat resolution. Effect events are appended to `events`.
 */
export function stepWorld(
  world: LevelWorld,
  input: WorldStepInput,
  dt: number,
  deps: WorldStepDependencies,
  events: SimulationEvent[]
): WorldStepResult {
  const { player, field } = world;

  tickWeapon(player.weapon, dt);
  advanceCraft(player, field);
  let playerShot: Projectile | null = null;
  if (input.fireHeld && player.weapon.charges > 0) {
    playerShot = firePlayer(player, deps.ids.next('shot'));
    if (playerShot) {
      world.friendlyProjectiles.push(playerShot);
      events.push({
        type: 'projectile-fired',
        side: 'friendly',
        id: playerShot.id,
        at: playerShot.position,
        heading: playerShot.heading
      });
    }
  }

  for (const hostile of world.hostiles) {
    updateHostileAi(hostile, player.position, field.cells, dt, deps.random);
    advanceCraft(hostile, field);
    hostile.ai.lastKnownPlayer = { x: player.position.x, y: player.position.y };
    const shot = tryHostileFire(hostile, deps.ids.next('bolt'));
    if (shot) {
      world.hostileProjectiles.push(shot);
      events.push({ type: 'projectile-fired', side: 'hostile', id: shot.id, at: shot.position, heading: shot.heading });
    }
  }

  world.friendlyProjectiles = advanceProjectiles(world.friendlyProjectiles, field, dt, events);
  world.hostileProjectiles = advanceProjectiles(world.hostileProjectiles, field, dt, events);

  const spawn = stepSpawner(
    world.spawner,
    {
      field,
      player,
      hostiles: world.hostiles,
      target: world.hostileTarget,
      random: deps.random,
      nextId: () => deps.ids.next('hostile')
    },
    dt
  );
  if (spawn.kind === 'spawned') {
    events.push({
      type: 'hostile-spawned',
      id: spawn.hostile.id,
      at: spawn.hostile.position,
      heading: spawn.hostile.heading
    });
  }

  const outcome = resolveCombat(world);
  for (const kill of outcome.kills) {
    events.push({ type: 'hostile-destroyed', id: kill.hostileId, projectileId: kill.projectileId, at: kill.at });
  }
  return { playerShot, outcome };
}

