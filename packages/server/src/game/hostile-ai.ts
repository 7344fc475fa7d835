// hostile-ai.ts
// Summary: Per-hostile patrol/homing state machine: heading control, line-of-sight raycast against the
//          obstacle grid, and fire decisions gated by a readiness timer.
// Structure: hasLineOfSight -> updateHostileAi (timers, mode switch, turning, visibility) -> tryHostileFire.
// Usage: updateHostileAi(hostile, player.position, field.cells, dt, random); advanceCraft(hostile, field);
//        hostile.ai.lastKnownPlayer = player.position; const shot = tryHostileFire(hostile, id);
// ---------------------------------------------------------------------------

import { CARDINAL_HEADINGS, HOSTILE_AI, type RandomSource, type Vec2 } from '@wingmaze/shared';

import type { HostileCraft } from './craft.js';
import { bearing, distance, normalizeHeading, shortestAngleDiff } from './geometry.js';
import { isPointBlocked, type ObstacleCell } from './obstacle-field.js';
import { createProjectile, type Projectile } from './projectiles.js';

/**
 * True when the target is within sight range, inside the forward cone, and no sample taken every
 * `sightSampleStep` units along the segment lands inside a cell.
 */
export function hasLineOfSight(hostile: HostileCraft, target: Vec2, cells: readonly ObstacleCell[]): boolean {
  const origin = hostile.position;
  const range = distance(origin, target);
  if (range > HOSTILE_AI.sightRange) return false;

  const offAxis = Math.abs(shortestAngleDiff(hostile.heading, bearing(origin, target)));
  if (offAxis > HOSTILE_AI.sightConeDegrees) return false;

  const dx = target.x - origin.x;
  const dy = target.y - origin.y;
  const steps = Math.floor(range / HOSTILE_AI.sightSampleStep);
  for (let i = 1; i <= steps; i += 1) {
    const sample = { x: origin.x + (dx * i) / steps, y: origin.y + (dy * i) / steps };
    if (isPointBlocked(cells, sample)) return false;
  }
  return true;
}

/**
 * Runs one AI tick: homing inside `homingRange` (after the engagement delay, a fast 20% turn towards the
 * pilot), patrol outside it (random cardinal targets approached with a slow 5% turn), then refreshes
 * visibility and the fire readiness timer. Movement is left to advanceCraft.
 */
export function updateHostileAi(
  hostile: HostileCraft,
  player: Vec2,
  cells: readonly ObstacleCell[],
  dt: number,
  random: RandomSource
): void {
  const { ai } = hostile;
  ai.directionTimer = Math.max(0, ai.directionTimer - dt);

  const range = distance(hostile.position, player);
  if (range < HOSTILE_AI.homingRange) {
    if (ai.mode !== 'homing') {
      ai.mode = 'homing';
      ai.homingTimer = HOSTILE_AI.homingDelaySeconds;
    }
    if (ai.homingTimer > 0) {
      ai.homingTimer = Math.max(0, ai.homingTimer - dt);
    }
    if (ai.homingTimer <= 0) {
      const towardPlayer = bearing(hostile.position, player);
      hostile.heading = normalizeHeading(
        hostile.heading + shortestAngleDiff(hostile.heading, towardPlayer) * HOSTILE_AI.homingTurnRate
      );
      ai.targetHeading = normalizeHeading(towardPlayer);
      ai.directionTimer = 0;
    }
  } else {
    ai.mode = 'patrol';
    ai.homingTimer = HOSTILE_AI.homingDelaySeconds;
    if (ai.directionTimer <= 0) {
      ai.targetHeading = random.pick(CARDINAL_HEADINGS);
      ai.directionTimer = random.between(HOSTILE_AI.patrolIntervalMin, HOSTILE_AI.patrolIntervalMax);
    }
    hostile.heading = normalizeHeading(
      hostile.heading + shortestAngleDiff(hostile.heading, ai.targetHeading) * HOSTILE_AI.patrolTurnRate
    );
  }

  ai.canSeePlayer = hasLineOfSight(hostile, player, cells);
  ai.fireTimer = Math.max(0, ai.fireTimer - dt);
}

/**
 * Fires when ready and either seeing the pilot or homing. Homing shots aim at the cached pilot position;
 * any other shot follows the current heading.
 */
export function tryHostileFire(hostile: HostileCraft, projectileId: string): Projectile | null {
  const { ai } = hostile;
  if (ai.fireTimer > 0) return null;
  const homing = ai.mode === 'homing';
  if (!ai.canSeePlayer && !homing) return null;

  const heading = homing && ai.lastKnownPlayer ? bearing(hostile.position, ai.lastKnownPlayer) : hostile.heading;
  ai.fireTimer = HOSTILE_AI.fireDelaySeconds;
  return createProjectile(projectileId, 'hostile', hostile.position, heading);
}
