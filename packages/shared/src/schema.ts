// schema.ts
// Summary: Colyseus schema definitions replicated to the sortie client plus the command/event catalogs
//          and decoded input vocabulary exchanged over the room transport.
// Structure: Dense runtime buffers for obstacles, hostiles and projectiles -> player view -> SortieState
//            root -> GAME_COMMAND / GAME_EVENT literals -> input unions (directions, buttons, name entry).
// Usage: import { SortieState, GAME_COMMAND } from '@wingmaze/shared';
// ---------------------------------------------------------------------------

import { Schema, type, ArraySchema } from '@colyseus/schema';

/**
 * ObstacleBufferSchema mirrors the obstacle field as parallel arrays. It is rewritten only when the
 * layout revision changes, i.e. once per level.
 */
export class ObstacleBufferSchema extends Schema {
  @type(['number']) declare x: ArraySchema<number>;
  @type(['number']) declare y: ArraySchema<number>;
  @type(['number']) declare size: ArraySchema<number>;

  constructor() {
    super();
    this.x = new ArraySchema<number>();
    this.y = new ArraySchema<number>();
    this.size = new ArraySchema<number>();
  }
}

/**
 * PlayerViewSchema carries the pilot craft plus weapon charge state for the HUD.
 */
export class PlayerViewSchema extends Schema {
  @type('boolean') declare present: boolean;
  @type('number') declare x: number;
  @type('number') declare y: number;
  @type('number') declare heading: number;
  @type('number') declare radius: number;
  @type('number') declare charges: number;
  @type(['number']) declare rechargeProgress: ArraySchema<number>;

  constructor() {
    super();
    this.present = false;
    this.x = 0;
    this.y = 0;
    this.heading = 0;
    this.radius = 0;
    this.charges = 0;
    this.rechargeProgress = new ArraySchema<number>();
  }
}

/**
 * HostileRuntimeBufferSchema packs hostile craft and their AI indicator flags into dense arrays so patches
 * stay compact while hostiles spawn and die.
 */
export class HostileRuntimeBufferSchema extends Schema {
  @type(['string']) declare id: ArraySchema<string>;
  @type(['number']) declare x: ArraySchema<number>;
  @type(['number']) declare y: ArraySchema<number>;
  @type(['number']) declare heading: ArraySchema<number>;
  @type(['number']) declare radius: ArraySchema<number>;
  @type(['boolean']) declare canSeePlayer: ArraySchema<boolean>;
  @type(['boolean']) declare homing: ArraySchema<boolean>;

  constructor() {
    super();
    this.id = new ArraySchema<string>();
    this.x = new ArraySchema<number>();
    this.y = new ArraySchema<number>();
    this.heading = new ArraySchema<number>();
    this.radius = new ArraySchema<number>();
    this.canSeePlayer = new ArraySchema<boolean>();
    this.homing = new ArraySchema<boolean>();
  }
}

/**
 * ProjectileRuntimeBufferSchema mirrors both friendly and hostile projectiles; `side` tells them apart.
 */
export class ProjectileRuntimeBufferSchema extends Schema {
  @type(['string']) declare id: ArraySchema<string>;
  @type(['string']) declare side: ArraySchema<string>;
  @type(['number']) declare x: ArraySchema<number>;
  @type(['number']) declare y: ArraySchema<number>;
  @type(['number']) declare heading: ArraySchema<number>;

  constructor() {
    super();
    this.id = new ArraySchema<string>();
    this.side = new ArraySchema<string>();
    this.x = new ArraySchema<number>();
    this.y = new ArraySchema<number>();
    this.heading = new ArraySchema<number>();
  }
}

/**
 * SortieState holds the authoritative session view replicated to the pilot's client.
 */
export class SortieState extends Schema {
  @type('string') declare phase: string;
  @type('number') declare levelIndex: number;
  @type('number') declare levelCount: number;
  @type('number') declare score: number;
  @type('number') declare kills: number;
  @type('number') declare remainingTime: number;
  @type('number') declare survivalTime: number;
  @type('number') declare cameraX: number;
  @type('number') declare cameraY: number;
  @type('boolean') declare nameEntryActive: boolean;
  @type('string') declare nameEntryText: string;
  @type('number') declare layoutRevision: number;
  @type('number') declare tick: number;

  @type(ObstacleBufferSchema)
  declare obstacles: ObstacleBufferSchema;

  @type(PlayerViewSchema)
  declare player: PlayerViewSchema;

  @type(HostileRuntimeBufferSchema)
  declare hostiles: HostileRuntimeBufferSchema;

  @type(ProjectileRuntimeBufferSchema)
  declare projectiles: ProjectileRuntimeBufferSchema;

  constructor() {
    super();
    this.phase = 'menu';
    this.levelIndex = 0;
    this.levelCount = 0;
    this.score = 0;
    this.kills = 0;
    this.remainingTime = 0;
    this.survivalTime = 0;
    this.cameraX = 0;
    this.cameraY = 0;
    this.nameEntryActive = false;
    this.nameEntryText = '';
    this.layoutRevision = -1;
    this.tick = 0;
    this.obstacles = new ObstacleBufferSchema();
    this.player = new PlayerViewSchema();
    this.hostiles = new HostileRuntimeBufferSchema();
    this.projectiles = new ProjectileRuntimeBufferSchema();
  }
}

/**
 * Message channels for client -> server commands. Payloads are already decoded intents; the client owns
 * key bindings and button hit-testing.
 */
export const GAME_COMMAND = {
  Movement: 'cmd:movement',
  Fire: 'cmd:fire',
  Pointer: 'cmd:pointer',
  Button: 'cmd:button',
  StartLevel: 'cmd:start-level',
  NameEntry: 'cmd:name-entry'
} as const;
export type GameCommand = (typeof GAME_COMMAND)[keyof typeof GAME_COMMAND];

/**
 * Message channels for server -> client events that are not covered by schema replication.
 */
export const GAME_EVENT = {
  Effects: 'evt:effects',
  LevelTable: 'evt:levels',
  HighScores: 'evt:highscores',
  ScoreSaved: 'evt:score:saved',
  ScoreSaveFailed: 'evt:score:failed'
} as const;
export type GameEvent = (typeof GAME_EVENT)[keyof typeof GAME_EVENT];

export const MOVEMENT_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;
export type MovementDirection = (typeof MOVEMENT_DIRECTIONS)[number];

export const BUTTON_IDS = ['start', 'high-scores', 'continue', 'restart', 'menu', 'next-level', 'back'] as const;
export type ButtonId = (typeof BUTTON_IDS)[number];

export const NAME_ENTRY_KINDS = ['char', 'backspace', 'space', 'confirm'] as const;
export type NameEntryKind = (typeof NAME_ENTRY_KINDS)[number];
