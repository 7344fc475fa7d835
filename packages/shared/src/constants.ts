// constants.ts
// Summary: Gameplay tunables shared by the simulation server and any renderer that draws its snapshots.
// Structure: Field geometry -> craft sizes and speeds -> weapon and AI timings -> scoring constants.
// Usage: import { FIELD, CRAFT } from '@wingmaze/shared';
// ---------------------------------------------------------------------------

/** Playfield dimensions and obstacle/spawn lattice spacing. Speeds below are units per tick. */
export const FIELD = {
  width: 800,
  height: 600,
  cellSize: 32,
  spawnGridSpacing: 50,
  centerClearRadius: 150
} as const;

export const CRAFT = {
  playerRadius: 20,
  hostileRadius: 18,
  playerSpeed: 3,
  hostileSpeed: 1.5,
  maxHostiles: 6
} as const;

export const PROJECTILE = {
  radius: 4,
  friendlySpeed: 8,
  hostileSpeed: 5,
  trailInterval: 0.05
} as const;

export const WEAPON = {
  maxCharges: 2,
  rechargeSeconds: 4,
  shotCooldownSeconds: 0.3
} as const;

export const HOSTILE_AI = {
  homingRange: 200,
  sightRange: 300,
  sightConeDegrees: 45,
  sightSampleStep: 10,
  homingDelaySeconds: 1,
  fireDelaySeconds: 1,
  homingTurnRate: 0.2,
  patrolTurnRate: 0.05,
  patrolIntervalMin: 1,
  patrolIntervalMax: 3
} as const;

export const SPAWNER = {
  delaySeconds: 2,
  maxAttempts: 100,
  minHostileSpacing: 150,
  minPlayerDistance: 250
} as const;

export const SCORING = {
  killAward: 100,
  survivalBonusPerSecond: 10
} as const;

export const SESSION = {
  transitionLockSeconds: 0.7,
  nameMaxLength: 15,
  highScoreLimit: 10
} as const;

export const CARDINAL_HEADINGS = [0, 90, 180, 270] as const;
