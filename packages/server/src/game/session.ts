// session.ts
// Summary: Session state machine sequencing menu, rules, ready, playing, level-complete, game-over, win and
//          high-score screens. Owns the level world, score and kill counters, the transition lock, the
//          name-entry buffer and the follow camera, and produces the render snapshot after every tick.
// Structure: dependency contracts -> SessionController (input handlers, tick, snapshot, private setup and
//            transition helpers).
// Usage: const session = new SessionController({ levels, random, submitScore });
//        session.activate('start'); const events = session.tick(1 / 60); const view = session.snapshot();
// ---------------------------------------------------------------------------

import {
  FIELD,
  SCORING,
  SESSION,
  type ButtonId,
  type LevelDescriptor,
  type MovementDirection,
  type NameEntryKind,
  type PlayerView,
  type RandomSource,
  type SessionPhase,
  type SessionSnapshot,
  type SimulationEvent,
  type Vec2
} from '@wingmaze/shared';

import { Camera } from './camera.js';
import { aimPlayerAt, rechargeProgress, setIntent } from './craft.js';
import { createLevelWorld, stepWorld, IdSequence, type FieldFactory, type LevelWorld } from './world.js';

export interface ScoreSubmission {
  readonly name: string;
  readonly score: number;
  readonly level: number;
}

export interface SessionDependencies {
  readonly levels: readonly LevelDescriptor[];
  readonly random: RandomSource;
  /** Receives confirmed high-score entries; must not block. */
  readonly submitScore?: (submission: ScoreSubmission) => void;
  /** Shake jitter in [0, 1). Cosmetic only, so it defaults to Math.random. */
  readonly cameraJitter?: () => number;
  readonly fieldFactory?: FieldFactory;
}

const NAME_CHARACTER = /^[\p{L}\p{N}]$/u;

/** Phases that draw the level scene; the others show a menu screen without the pilot. */
const SCENE_PHASES: ReadonlySet<SessionPhase> = new Set<SessionPhase>([
  'ready',
  'playing',
  'level-complete',
  'game-over',
  'win'
]);

export class SessionController {
  private readonly levels: readonly LevelDescriptor[];
  private readonly random: RandomSource;
  private readonly submitScore: ((submission: ScoreSubmission) => void) | undefined;
  private readonly fieldFactory: FieldFactory | undefined;
  private readonly ids = new IdSequence();
  private readonly camera: Camera;

  private currentPhase: SessionPhase = 'menu';
  private currentLevel = 0;
  private totalScore = 0;
  private totalKills = 0;
  private killsThisLevel = 0;
  private levelTime = 0;
  private levelStartTime = 0;
  private survivalTime = 0;
  private transitionLock = 0;
  private fireHeld = false;
  private layoutRevision = 0;
  private nameEntryActive = false;
  private nameEntryText = '';
  private currentWorld: LevelWorld;
  private pendingEvents: SimulationEvent[] = [];

  constructor(deps: SessionDependencies) {
    if (deps.levels.length === 0) {
      throw new Error('SessionController requires at least one level');
    }
    this.levels = deps.levels;
    this.random = deps.random;
    this.submitScore = deps.submitScore;
    this.fieldFactory = deps.fieldFactory;
    this.currentWorld = this.buildWorld();
    this.layoutRevision += 1;
    this.camera = new Camera(
      { width: FIELD.width, height: FIELD.height },
      { width: this.currentWorld.field.width, height: this.currentWorld.field.height },
      deps.cameraJitter
    );
  }

  get phase(): SessionPhase {
    return this.currentPhase;
  }

  get levelIndex(): number {
    return this.currentLevel;
  }

  get score(): number {
    return this.totalScore;
  }

  get kills(): number {
    return this.totalKills;
  }

  get levelKills(): number {
    return this.killsThisLevel;
  }

  get world(): LevelWorld {
    return this.currentWorld;
  }

  get transitionLocked(): boolean {
    return this.transitionLock > 0;
  }

  get nameEntry(): { active: boolean; text: string } {
    return { active: this.nameEntryActive, text: this.nameEntryText };
  }

  setMovement(direction: MovementDirection, active: boolean): boolean {
    if (this.currentPhase !== 'playing') return false;
    setIntent(this.currentWorld.player, direction, active);
    return true;
  }

  setFireHeld(held: boolean): boolean {
    if (this.currentPhase !== 'playing') return false;
    this.fireHeld = held;
    return true;
  }

  /** Aims the pilot at a pointer given in screen coordinates. */
  pointerMoved(screen: Vec2): boolean {
    if (this.currentPhase !== 'playing') return false;
    aimPlayerAt(this.currentWorld.player, this.camera.toWorld(screen));
    return true;
  }

  /** Ready -> Playing. Not subject to the transition lock. */
  startLevel(): boolean {
    if (this.currentPhase !== 'ready') return false;
    this.levelStartTime = this.levelTime;
    this.transition('playing', this.pendingEvents);
    return true;
  }

  /** Applies a decoded screen button; returns false when the button is not legal right now. */
  activate(button: ButtonId): boolean {
    if (this.transitionLock > 0) return false;
    const events = this.pendingEvents;

    switch (this.currentPhase) {
      case 'menu':
        if (button === 'start') return this.transition('rules', events);
        if (button === 'high-scores') return this.transition('high-scores', events);
        return false;
      case 'rules':
        if (button !== 'continue') return false;
        this.resetRun();
        this.setupLevel();
        return this.transition('ready', events);
      case 'level-complete':
        if (button === 'next-level') {
          if (this.currentLevel + 1 < this.levels.length) {
            this.currentLevel += 1;
            this.setupLevel();
            return this.transition('ready', events);
          }
          this.nameEntryActive = true;
          this.nameEntryText = '';
          return this.transition('win', events);
        }
        if (button === 'menu') {
          this.setupLevel();
          return this.transition('menu', events);
        }
        return false;
      case 'game-over':
        if (button === 'restart') {
          this.setupLevel();
          return this.transition('rules', events);
        }
        if (button === 'menu') {
          this.setupLevel();
          return this.transition('menu', events);
        }
        return false;
      case 'win':
        if (this.nameEntryActive) return false;
        if (button === 'restart') {
          this.resetRun();
          this.setupLevel();
          return this.transition('rules', events);
        }
        if (button === 'menu') {
          this.setupLevel();
          return this.transition('menu', events);
        }
        if (button === 'high-scores') return this.transition('high-scores', events);
        return false;
      case 'high-scores':
        if (button === 'back') return this.transition('menu', events);
        return false;
      default:
        return false;
    }
  }

  /** Edits the winner's name buffer; `confirm` hands a non-empty name to the score sink. */
  nameEntryInput(kind: NameEntryKind, char?: string): boolean {
    if (this.currentPhase !== 'win' || !this.nameEntryActive) return false;
    switch (kind) {
      case 'char':
        if (!char || !NAME_CHARACTER.test(char) || this.nameEntryText.length >= SESSION.nameMaxLength) return false;
        this.nameEntryText += char;
        return true;
      case 'space':
        if (this.nameEntryText.length >= SESSION.nameMaxLength) return false;
        this.nameEntryText += ' ';
        return true;
      case 'backspace':
        this.nameEntryText = this.nameEntryText.slice(0, -1);
        return true;
      case 'confirm': {
        if (this.nameEntryText.length === 0) return false;
        const submission: ScoreSubmission = {
          name: this.nameEntryText,
          score: this.totalScore,
          level: this.levels.length
        };
        this.nameEntryActive = false;
        this.nameEntryText = '';
        this.pendingEvents.push({ type: 'score-submitted', ...submission });
        this.submitScore?.(submission);
        return true;
      }
    }
  }

  /** Advances one frame and returns the effect events raised since the previous tick. */
  tick(dt: number): SimulationEvent[] {
    const events = this.pendingEvents;
    this.pendingEvents = [];

    if (this.transitionLock > 0) {
      this.transitionLock = Math.max(0, this.transitionLock - dt);
    }
    this.camera.update(this.currentWorld.player.position, dt);
    if (this.currentPhase === 'playing') {
      this.stepPlaying(dt, events);
    }
    return events;
  }

  snapshot(): SessionSnapshot {
    const world = this.currentWorld;
    const level = this.levels[this.currentLevel];
    const elapsed = this.levelTime - this.levelStartTime;
    const { player } = world;
    const playerView: PlayerView | null = SCENE_PHASES.has(this.currentPhase)
      ? {
          x: player.position.x,
          y: player.position.y,
          heading: player.heading,
          radius: player.radius,
          charges: player.weapon.charges,
          rechargeProgress: rechargeProgress(player.weapon)
        }
      : null;

    return {
      phase: this.currentPhase,
      levelIndex: this.currentLevel,
      levelCount: this.levels.length,
      score: this.totalScore,
      kills: this.totalKills,
      levelKills: this.killsThisLevel,
      remainingTime: Math.max(0, level.timeLimit - elapsed),
      survivalTime: this.survivalTime,
      layoutRevision: this.layoutRevision,
      obstacles: world.field.cells.map((cell) => ({ x: cell.x, y: cell.y, size: cell.size })),
      player: playerView,
      hostiles: world.hostiles.map((hostile) => ({
        id: hostile.id,
        x: hostile.position.x,
        y: hostile.position.y,
        heading: hostile.heading,
        radius: hostile.radius,
        canSeePlayer: hostile.ai.canSeePlayer,
        homing: hostile.ai.mode === 'homing'
      })),
      projectiles: [...world.friendlyProjectiles, ...world.hostileProjectiles].map((projectile) => ({
        id: projectile.id,
        side: projectile.side,
        x: projectile.position.x,
        y: projectile.position.y,
        heading: projectile.heading,
        radius: projectile.radius
      })),
      camera: this.camera.offset,
      nameEntry: { active: this.nameEntryActive, text: this.nameEntryText },
      levelSummary:
        this.currentPhase === 'level-complete'
          ? {
              timeTaken: elapsed,
              levelKills: this.killsThisLevel,
              levelScore:
                this.killsThisLevel * SCORING.killAward +
                Math.trunc(level.timeLimit - elapsed) * SCORING.survivalBonusPerSecond,
              totalScore: this.totalScore
            }
          : null,
      transitionLocked: this.transitionLock > 0
    };
  }

  private stepPlaying(dt: number, events: SimulationEvent[]): void {
    this.levelTime += dt;
    this.survivalTime += dt;

    const level = this.levels[this.currentLevel];
    if (this.levelTime - this.levelStartTime >= level.timeLimit) {
      const bonus = Math.trunc(level.timeLimit) * SCORING.survivalBonusPerSecond;
      this.totalScore += bonus;
      events.push({ type: 'level-complete', levelIndex: this.currentLevel, bonus });
      this.transition('level-complete', events);
      return;
    }

    const { playerShot, outcome } = stepWorld(
      this.currentWorld,
      { fireHeld: this.fireHeld },
      dt,
      { random: this.random, ids: this.ids },
      events
    );
    if (playerShot) {
      this.camera.shake(3, 0.1);
    }
    const killCount = outcome.kills.length;
    if (killCount > 0) {
      this.totalScore += killCount * SCORING.killAward;
      this.totalKills += killCount;
      this.killsThisLevel += killCount;
      this.camera.shake(8, 0.2);
    }
    if (outcome.playerHit) {
      if (outcome.playerHit.cause === 'projectile') {
        this.camera.shake(15, 0.5);
      } else {
        this.camera.shake(20, 0.6);
      }
      events.push({ type: 'player-destroyed', cause: outcome.playerHit.cause, at: outcome.playerHit.at });
      this.transition('game-over', events);
    }
  }

  private transition(to: SessionPhase, events: SimulationEvent[]): true {
    const from = this.currentPhase;
    this.currentPhase = to;
    this.transitionLock = SESSION.transitionLockSeconds;
    events.push({ type: 'phase-changed', from, to });
    return true;
  }

  private resetRun(): void {
    this.currentLevel = 0;
    this.totalScore = 0;
    this.totalKills = 0;
    this.survivalTime = 0;
  }

  private buildWorld(): LevelWorld {
    return createLevelWorld(this.levels[this.currentLevel], this.random, this.ids, this.fieldFactory);
  }

  /** Regenerates the current level's world and clears the per-level counters. */
  private setupLevel(): void {
    this.currentWorld = this.buildWorld();
    this.layoutRevision += 1;
    this.fireHeld = false;
    this.levelTime = 0;
    this.levelStartTime = 0;
    this.killsThisLevel = 0;
  }
}
