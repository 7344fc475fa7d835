// combat.ts
// Summary: Per-tick collision and combat resolution in fixed order: friendly shots vs hostiles (scoring),
//          then hostile shots vs the pilot, then hostile craft vs the pilot.
// Structure: CombatOutcome types -> resolveCombat which prunes destroyed entities from the world lists.
// Usage: const outcome = resolveCombat(world); if (outcome.playerHit) { ... }
// ---------------------------------------------------------------------------

import type { PlayerLossCause, Vec2 } from '@wingmaze/shared';

import type { HostileCraft, PlayerCraft } from './craft.js';
import { distance } from './geometry.js';
import type { Projectile } from './projectiles.js';

export interface CombatParticipants {
  readonly player: PlayerCraft;
  hostiles: HostileCraft[];
  friendlyProjectiles: Projectile[];
  hostileProjectiles: Projectile[];
}

export interface HostileKill {
  readonly hostileId: string;
  readonly projectileId: string;
  readonly at: Vec2;
}

export interface PlayerHit {
  readonly cause: PlayerLossCause;
  readonly at: Vec2;
}

export interface CombatOutcome {
  readonly kills: HostileKill[];
  readonly playerHit: PlayerHit | null;
}

export function resolveCombat(world: CombatParticipants): CombatOutcome {
  const kills: HostileKill[] = [];
  const spentProjectiles = new Set<string>();

  for (const projectile of world.friendlyProjectiles) {
    for (const hostile of world.hostiles) {
      if (distance(projectile.position, hostile.position) < hostile.radius + projectile.radius) {
        spentProjectiles.add(projectile.id);
        kills.push({ hostileId: hostile.id, projectileId: projectile.id, at: hostile.position });
        world.hostiles = world.hostiles.filter((entry) => entry !== hostile);
        break;
      }
    }
  }
  if (spentProjectiles.size > 0) {
    world.friendlyProjectiles = world.friendlyProjectiles.filter((entry) => !spentProjectiles.has(entry.id));
  }

  const { player } = world;
  for (const projectile of world.hostileProjectiles) {
    if (distance(projectile.position, player.position) < player.radius + projectile.radius) {
      return { kills, playerHit: { cause: 'projectile', at: player.position } };
    }
  }

  for (const hostile of world.hostiles) {
    if (distance(hostile.position, player.position) < player.radius + hostile.radius) {
      const at = {
        x: (player.position.x + hostile.position.x) / 2,
        y: (player.position.y + hostile.position.y) / 2
      };
      return { kills, playerHit: { cause: 'collision', at } };
    }
  }

  return { kills, playerHit: null };
}
