// projectiles.ts
// Summary: Projectile lifecycle: creation from a firing craft, per-tick advance with wall and off-field
//          removal, and trail effect pacing.
// Structure: Projectile type -> createProjectile -> advanceProjectile (single) -> advanceProjectiles (list).
// Usage: const survivors = advanceProjectiles(world.friendlyProjectiles, field, dt, events);
// ---------------------------------------------------------------------------

import { PROJECTILE, type ProjectileSide, type SimulationEvent, type Vec2 } from '@wingmaze/shared';

import { headingVector, normalizeHeading } from './geometry.js';
import { isPointBlocked, type ObstacleField } from './obstacle-field.js';

export interface Projectile {
  readonly id: string;
  readonly side: ProjectileSide;
  position: Vec2;
  readonly heading: number;
  readonly speed: number;
  readonly radius: number;
  trailTimer: number;
}

export type ProjectileRemovalReason = 'wall' | 'off-field';

export type ProjectileAdvanceResult =
  | { readonly removed: false }
  | { readonly removed: true; readonly reason: ProjectileRemovalReason };

export function createProjectile(id: string, side: ProjectileSide, origin: Vec2, heading: number): Projectile {
  return {
    id,
    side,
    position: { x: origin.x, y: origin.y },
    heading: normalizeHeading(heading),
    speed: side === 'friendly' ? PROJECTILE.friendlySpeed : PROJECTILE.hostileSpeed,
    radius: PROJECTILE.radius,
    trailTimer: 0
  };
}

export function isOffField(position: Vec2, field: Pick<ObstacleField, 'width' | 'height'>): boolean {
  return position.x < 0 || position.x > field.width || position.y < 0 || position.y > field.height;
}

/**
 * Moves one projectile. A candidate position inside a cell destroys the projectile without committing
 * the move; the off-field check runs against the committed position.
 */
export function advanceProjectile(
  projectile: Projectile,
  field: ObstacleField,
  dt: number,
  events: SimulationEvent[]
): ProjectileAdvanceResult {
  const step = headingVector(projectile.heading, projectile.speed);
  const candidate = { x: projectile.position.x + step.x, y: projectile.position.y + step.y };

  projectile.trailTimer += dt;
  if (projectile.trailTimer >= PROJECTILE.trailInterval) {
    projectile.trailTimer = 0;
    events.push({ type: 'trail', side: projectile.side, at: projectile.position });
  }

  if (isPointBlocked(field.cells, candidate)) {
    events.push({ type: 'wall-impact', side: projectile.side, id: projectile.id, at: candidate });
    return { removed: true, reason: 'wall' };
  }

  projectile.position = candidate;
  if (isOffField(candidate, field)) {
    return { removed: true, reason: 'off-field' };
  }
  return { removed: false };
}

/** Advances every projectile in order and returns the survivors. */
export function advanceProjectiles(
  projectiles: readonly Projectile[],
  field: ObstacleField,
  dt: number,
  events: SimulationEvent[]
): Projectile[] {
  return projectiles.filter((projectile) => !advanceProjectile(projectile, field, dt, events).removed);
}
