// index.ts
// Summary: Public entry point for the shared workspace, re-exporting tunables, the level table model,
//          the random source, the render snapshot contract and the replicated schema.
// Structure: Named exports grouped by module so client and server packages import from one place.
// Usage: import { FIELD, createRandom, SortieState } from '@wingmaze/shared';
// ---------------------------------------------------------------------------

export {
  FIELD,
  CRAFT,
  PROJECTILE,
  WEAPON,
  HOSTILE_AI,
  SPAWNER,
  SCORING,
  SESSION,
  CARDINAL_HEADINGS
} from './constants.js';
export { DEFAULT_LEVELS, isRecord, sanitizeLevelTable, type LevelDescriptor } from './levels.js';
export { createRandom, randomFromGenerator, type RandomSource } from './random.js';
export {
  SortieState,
  ObstacleBufferSchema,
  PlayerViewSchema,
  HostileRuntimeBufferSchema,
  ProjectileRuntimeBufferSchema,
  GAME_COMMAND,
  GAME_EVENT,
  MOVEMENT_DIRECTIONS,
  BUTTON_IDS,
  NAME_ENTRY_KINDS,
  type GameCommand,
  type GameEvent,
  type MovementDirection,
  type ButtonId,
  type NameEntryKind
} from './schema.js';
export {
  writeSessionState,
  type Vec2,
  type SessionPhase,
  type ProjectileSide,
  type ObstacleView,
  type PlayerView,
  type HostileView,
  type ProjectileView,
  type LevelSummary,
  type SessionSnapshot,
  type PlayerLossCause,
  type SimulationEvent
} from './snapshot.js';
