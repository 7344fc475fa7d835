// craft.ts
// Summary: Kinematic model shared by the pilot craft and hostile craft: tagged craft variants, the
//          move-or-reject advance step against field bounds and obstacle cells, and the pilot's two-charge
//          weapon.
// Structure: Craft variant types -> factories -> advanceCraft -> weapon timers and firing -> HUD helpers.
// Usage: advanceCraft(world.player, world.field); const shot = firePlayer(world.player, ids.next('shot'));
// ---------------------------------------------------------------------------

import { CRAFT, HOSTILE_AI, WEAPON, type MovementDirection, type Vec2 } from '@wingmaze/shared';

import { bearing, headingVector, normalizeHeading } from './geometry.js';
import { blocksCraft, type ObstacleField } from './obstacle-field.js';
import { createProjectile, type Projectile } from './projectiles.js';

export type MovementIntent = Record<MovementDirection, boolean>;

export interface WeaponState {
  charges: number;
  readonly rechargeTimers: number[];
  cooldown: number;
}

interface CraftBase {
  readonly id: string;
  position: Vec2;
  heading: number;
  readonly radius: number;
  readonly speed: number;
}

export interface PlayerCraft extends CraftBase {
  readonly kind: 'player';
  readonly intent: MovementIntent;
  readonly weapon: WeaponState;
}

export type HostileMode = 'patrol' | 'homing';

export interface HostileAiState {
  mode: HostileMode;
  targetHeading: number;
  directionTimer: number;
  homingTimer: number;
  fireTimer: number;
  canSeePlayer: boolean;
  lastKnownPlayer: Vec2 | null;
}

export interface HostileCraft extends CraftBase {
  readonly kind: 'hostile';
  readonly ai: HostileAiState;
}

export type Craft = PlayerCraft | HostileCraft;

export function createPlayerCraft(id: string, position: Vec2, heading = 0): PlayerCraft {
  return {
    kind: 'player',
    id,
    position: { x: position.x, y: position.y },
    heading: normalizeHeading(heading),
    radius: CRAFT.playerRadius,
    speed: CRAFT.playerSpeed,
    intent: { up: false, down: false, left: false, right: false },
    weapon: {
      charges: WEAPON.maxCharges,
      rechargeTimers: Array.from({ length: WEAPON.maxCharges }, () => 0),
      cooldown: 0
    }
  };
}

export function createHostileCraft(id: string, position: Vec2, heading: number): HostileCraft {
  const normalized = normalizeHeading(heading);
  return {
    kind: 'hostile',
    id,
    position: { x: position.x, y: position.y },
    heading: normalized,
    radius: CRAFT.hostileRadius,
    speed: CRAFT.hostileSpeed,
    ai: {
      mode: 'patrol',
      targetHeading: normalized,
      directionTimer: 0,
      homingTimer: HOSTILE_AI.homingDelaySeconds,
      fireTimer: HOSTILE_AI.fireDelaySeconds,
      canSeePlayer: false,
      lastKnownPlayer: null
    }
  };
}

function candidatePosition(craft: Craft): Vec2 {
  switch (craft.kind) {
    case 'player': {
      const { intent } = craft;
      let dx = 0;
      let dy = 0;
      if (intent.up) dy = 1;
      if (intent.down) dy = -1;
      if (intent.left) dx = -1;
      if (intent.right) dx = 1;
      if (dx !== 0 || dy !== 0) {
        craft.heading = normalizeHeading(bearing({ x: 0, y: 0 }, { x: dx, y: dy }));
      }
      const step = headingVector(craft.heading, craft.speed);
      return {
        x: craft.position.x + (dx !== 0 ? step.x : 0),
        y: craft.position.y + (dy !== 0 ? step.y : 0)
      };
    }
    case 'hostile': {
      const step = headingVector(craft.heading, craft.speed);
      return { x: craft.position.x + step.x, y: craft.position.y + step.y };
    }
  }
}

export function isWithinField(point: Vec2, radius: number, field: Pick<ObstacleField, 'width' | 'height'>): boolean {
  return (
    radius <= point.x && point.x <= field.width - radius && radius <= point.y && point.y <= field.height - radius
  );
}

/**
 * Computes the craft's next position and commits it only when it stays inside the field and clear of
 * every inflated cell. A rejected move leaves the position untouched (no sliding).
 */
export function advanceCraft(craft: Craft, field: ObstacleField): boolean {
  const candidate = candidatePosition(craft);
  if (!isWithinField(candidate, craft.radius, field) || blocksCraft(field.cells, candidate, craft.radius)) {
    return false;
  }
  craft.position = candidate;
  return true;
}

export function setIntent(player: PlayerCraft, direction: MovementDirection, active: boolean): void {
  player.intent[direction] = active;
}

/** Points the pilot at a world-space target (pointer aiming). */
export function aimPlayerAt(player: PlayerCraft, target: Vec2): void {
  player.heading = normalizeHeading(bearing(player.position, target));
}

export function tickWeapon(weapon: WeaponState, dt: number): void {
  weapon.cooldown = Math.max(0, weapon.cooldown - dt);
  for (let i = 0; i < weapon.rechargeTimers.length; i += 1) {
    if (weapon.rechargeTimers[i] > 0) {
      weapon.rechargeTimers[i] -= dt;
      if (weapon.rechargeTimers[i] <= 0) {
        weapon.rechargeTimers[i] = 0;
        weapon.charges = Math.min(weapon.charges + 1, WEAPON.maxCharges);
      }
    }
  }
}

export function canFire(weapon: WeaponState): boolean {
  return weapon.charges > 0 && weapon.cooldown <= 0;
}

/** Spends a charge and returns the shot, or null while drained or cooling down. */
export function firePlayer(player: PlayerCraft, projectileId: string): Projectile | null {
  const { weapon } = player;
  if (!canFire(weapon)) return null;
  const idle = weapon.rechargeTimers.findIndex((timer) => timer <= 0);
  if (idle >= 0) {
    weapon.rechargeTimers[idle] = WEAPON.rechargeSeconds;
  }
  weapon.charges -= 1;
  weapon.cooldown = WEAPON.shotCooldownSeconds;
  return createProjectile(projectileId, 'friendly', player.position, player.heading);
}

/**
 * Progress per charge slot in [0, 1]: ready charges first as 1, then the running recharges from most to
 * least complete, then 0 for any slot with no charge and no recharge running.
 */
export function rechargeProgress(weapon: WeaponState): number[] {
  const recharging = weapon.rechargeTimers
    .filter((timer) => timer > 0)
    .map((timer) => Math.min(1, Math.max(0, 1 - timer / WEAPON.rechargeSeconds)))
    .sort((a, b) => b - a);
  return weapon.rechargeTimers.map((_timer, index) => {
    if (index < weapon.charges) return 1;
    return recharging[index - weapon.charges] ?? 0;
  });
}
