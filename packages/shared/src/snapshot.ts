// snapshot.ts
// Summary: Render-facing contract of the simulation: the read-only per-tick session snapshot, the effect
//          events emitted alongside it, and the writer that packs a snapshot into the replicated schema.
// Structure: Plain view interfaces -> SimulationEvent union -> writeSessionState helper.
// Usage: Server code calls writeSessionState(controller.snapshot(), room.state) after every tick; a
//        renderer consumes either the snapshot directly or the replicated SortieState.
// ---------------------------------------------------------------------------

import { ArraySchema } from '@colyseus/schema';

import type { SortieState } from './schema.js';

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export type SessionPhase =
  | 'menu'
  | 'rules'
  | 'ready'
  | 'playing'
  | 'game-over'
  | 'win'
  | 'level-complete'
  | 'high-scores';

export type ProjectileSide = 'friendly' | 'hostile';

export interface ObstacleView {
  readonly x: number;
  readonly y: number;
  readonly size: number;
}

export interface PlayerView {
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly radius: number;
  readonly charges: number;
  /** Per charge slot, 1 when ready and 0 right after use. */
  readonly rechargeProgress: readonly number[];
}

export interface HostileView {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly radius: number;
  readonly canSeePlayer: boolean;
  readonly homing: boolean;
}

export interface ProjectileView {
  readonly id: string;
  readonly side: ProjectileSide;
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly radius: number;
}

export interface LevelSummary {
  readonly timeTaken: number;
  readonly levelKills: number;
  readonly levelScore: number;
  readonly totalScore: number;
}

export interface SessionSnapshot {
  readonly phase: SessionPhase;
  readonly levelIndex: number;
  readonly levelCount: number;
  readonly score: number;
  readonly kills: number;
  readonly levelKills: number;
  readonly remainingTime: number;
  readonly survivalTime: number;
  readonly layoutRevision: number;
  readonly obstacles: readonly ObstacleView[];
  readonly player: PlayerView | null;
  readonly hostiles: readonly HostileView[];
  readonly projectiles: readonly ProjectileView[];
  readonly camera: Vec2;
  readonly nameEntry: { readonly active: boolean; readonly text: string };
  readonly levelSummary: LevelSummary | null;
  readonly transitionLocked: boolean;
}

export type PlayerLossCause = 'projectile' | 'collision';

export type SimulationEvent =
  | { readonly type: 'projectile-fired'; readonly side: ProjectileSide; readonly id: string; readonly at: Vec2; readonly heading: number }
  | { readonly type: 'wall-impact'; readonly side: ProjectileSide; readonly id: string; readonly at: Vec2 }
  | { readonly type: 'trail'; readonly side: ProjectileSide; readonly at: Vec2 }
  | { readonly type: 'hostile-spawned'; readonly id: string; readonly at: Vec2; readonly heading: number }
  | { readonly type: 'hostile-destroyed'; readonly id: string; readonly projectileId: string; readonly at: Vec2 }
  | { readonly type: 'player-destroyed'; readonly cause: PlayerLossCause; readonly at: Vec2 }
  | { readonly type: 'level-complete'; readonly levelIndex: number; readonly bonus: number }
  | { readonly type: 'phase-changed'; readonly from: SessionPhase; readonly to: SessionPhase }
  | { readonly type: 'score-submitted'; readonly name: string; readonly score: number; readonly level: number };

function clearArraySchema<T>(array: ArraySchema<T>): void {
  array.splice(0, array.length);
}

/** Mirrors a snapshot into the replicated schema; obstacles are rewritten only on a new layout. */
export function writeSessionState(snapshot: SessionSnapshot, state: SortieState): void {
  state.phase = snapshot.phase;
  state.levelIndex = snapshot.levelIndex;
  state.levelCount = snapshot.levelCount;
  state.score = snapshot.score;
  state.kills = snapshot.kills;
  state.remainingTime = snapshot.remainingTime;
  state.survivalTime = snapshot.survivalTime;
  state.cameraX = snapshot.camera.x;
  state.cameraY = snapshot.camera.y;
  state.nameEntryActive = snapshot.nameEntry.active;
  state.nameEntryText = snapshot.nameEntry.text;

  if (state.layoutRevision !== snapshot.layoutRevision) {
    const obstacles = state.obstacles;
    clearArraySchema(obstacles.x);
    clearArraySchema(obstacles.y);
    clearArraySchema(obstacles.size);
    for (const cell of snapshot.obstacles) {
      obstacles.x.push(cell.x);
      obstacles.y.push(cell.y);
      obstacles.size.push(cell.size);
    }
    state.layoutRevision = snapshot.layoutRevision;
  }

  const playerView = state.player;
  const player = snapshot.player;
  playerView.present = player !== null;
  playerView.x = player?.x ?? 0;
  playerView.y = player?.y ?? 0;
  playerView.heading = player?.heading ?? 0;
  playerView.radius = player?.radius ?? 0;
  playerView.charges = player?.charges ?? 0;
  clearArraySchema(playerView.rechargeProgress);
  for (const progress of player?.rechargeProgress ?? []) {
    playerView.rechargeProgress.push(progress);
  }

  const hostiles = state.hostiles;
  clearArraySchema(hostiles.id);
  clearArraySchema(hostiles.x);
  clearArraySchema(hostiles.y);
  clearArraySchema(hostiles.heading);
  clearArraySchema(hostiles.radius);
  clearArraySchema(hostiles.canSeePlayer);
  clearArraySchema(hostiles.homing);
  for (const hostile of snapshot.hostiles) {
    hostiles.id.push(hostile.id);
    hostiles.x.push(hostile.x);
    hostiles.y.push(hostile.y);
    hostiles.heading.push(hostile.heading);
    hostiles.radius.push(hostile.radius);
    hostiles.canSeePlayer.push(hostile.canSeePlayer);
    hostiles.homing.push(hostile.homing);
  }

  const projectiles = state.projectiles;
  clearArraySchema(projectiles.id);
  clearArraySchema(projectiles.side);
  clearArraySchema(projectiles.x);
  clearArraySchema(projectiles.y);
  clearArraySchema(projectiles.heading);
  for (const projectile of snapshot.projectiles) {
    projectiles.id.push(projectile.id);
    projectiles.side.push(projectile.side);
    projectiles.x.push(projectile.x);
    projectiles.y.push(projectile.y);
    projectiles.heading.push(projectile.heading);
  }

  state.tick += 1;
}
