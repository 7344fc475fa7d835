// sortie-room.ts
// Summary: Colyseus Room hosting one pilot's session. Decodes client commands into session inputs, steps
//          the session on the room clock at the configured tick rate, mirrors every snapshot into the
//          replicated SortieState and forwards effect events and high-score results as messages.
// Structure: dependency contract -> SortieRoom (onCreate wiring, onJoin catalogs, simulation step, score
//            persistence sink).
// Usage: gameServer.define('sortie', SortieRoom, { dependencies: { levels, tickRate, seed, scores } });
// ---------------------------------------------------------------------------

import type { Client } from '@colyseus/core';
import { Room } from '@colyseus/core';
import {
  GAME_COMMAND,
  GAME_EVENT,
  SortieState,
  createRandom,
  writeSessionState,
  type LevelDescriptor
} from '@wingmaze/shared';

import type { HighScoreEntry } from '../types.js';
import { decodeButton, decodeFire, decodeMovement, decodeNameEntry, decodePointer } from './commands.js';
import { SessionController, type ScoreSubmission } from './session.js';

export interface SortieRoomDependencies {
  levels: readonly LevelDescriptor[];
  tickRate: number;
  seed: string | null;
  scores: {
    list: () => HighScoreEntry[];
    submit: (name: string, score: number, level: number) => Promise<HighScoreEntry[]>;
  };
}

export class SortieRoom extends Room<SortieState> {
  maxClients = 1;

  private dependencies!: SortieRoomDependencies;
  private session!: SessionController;

  onCreate(options: { dependencies: SortieRoomDependencies }): void {
    this.dependencies = options.dependencies;
    this.session = new SessionController({
      levels: this.dependencies.levels,
      random: createRandom(this.dependencies.seed),
      submitScore: (submission) => this.persistScore(submission)
    });
    this.setState(new SortieState());
    writeSessionState(this.session.snapshot(), this.state);

    const dt = 1 / this.dependencies.tickRate;
    this.clock.setInterval(() => this.stepSimulation(dt), 1000 / this.dependencies.tickRate);

    this.onMessage(GAME_COMMAND.Movement, (_client, message: unknown) => {
      const command = decodeMovement(message);
      if (command) this.session.setMovement(command.direction, command.active);
    });
    this.onMessage(GAME_COMMAND.Fire, (_client, message: unknown) => {
      const held = decodeFire(message);
      if (held !== null) this.session.setFireHeld(held);
    });
    this.onMessage(GAME_COMMAND.Pointer, (_client, message: unknown) => {
      const pointer = decodePointer(message);
      if (pointer) this.session.pointerMoved(pointer);
    });
    this.onMessage(GAME_COMMAND.Button, (_client, message: unknown) => {
      const button = decodeButton(message);
      if (button) this.session.activate(button);
    });
    this.onMessage(GAME_COMMAND.StartLevel, () => {
      this.session.startLevel();
    });
    this.onMessage(GAME_COMMAND.NameEntry, (_client, message: unknown) => {
      const command = decodeNameEntry(message);
      if (command) this.session.nameEntryInput(command.kind, command.char);
    });
  }

  onJoin(client: Client): void {
    console.log(`Pilot ${client.sessionId} joined sortie ${this.roomId}`);
    client.send(GAME_EVENT.LevelTable, this.dependencies.levels);
    client.send(GAME_EVENT.HighScores, this.dependencies.scores.list());
  }

  onLeave(client: Client, _consented: boolean): void {
    console.log(`Pilot ${client.sessionId} left sortie ${this.roomId}`);
  }

  private stepSimulation(dt: number): void {
    try {
      const events = this.session.tick(dt);
      if (events.length > 0) {
        this.broadcast(GAME_EVENT.Effects, events);
      }
      if (events.some((event) => event.type === 'phase-changed' && event.to === 'high-scores')) {
        this.broadcast(GAME_EVENT.HighScores, this.dependencies.scores.list());
      }
      writeSessionState(this.session.snapshot(), this.state);
    } catch (error) {
      console.error('Simulation error', error);
    }
  }

  private persistScore(submission: ScoreSubmission): void {
    void this.dependencies.scores
      .submit(submission.name, submission.score, submission.level)
      .then((entries) => {
        console.log(`High score saved for ${submission.name}: ${submission.score}`);
        this.broadcast(GAME_EVENT.ScoreSaved, entries);
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error('Failed to save high score', message);
        this.broadcast(GAME_EVENT.ScoreSaveFailed, { name: submission.name, error: message });
      });
  }
}
