// scenarios.test.ts
// Summary: End-to-end encounters driven tick by tick: a distant patrol that never engages, a homing
//          hostile's first shot, and a point-blank kill scored through the session.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';
import type { LevelDescriptor, SimulationEvent } from '@wingmaze/shared';

import { createHostileCraft } from '../src/game/craft.js';
import { bearing, distance, shortestAngleDiff } from '../src/game/geometry.js';
import { SessionController } from '../src/game/session.js';
import { createLevelWorld, IdSequence, stepWorld, type LevelWorld } from '../src/game/world.js';
import { borderField, scriptedRandom } from './helpers.js';

const FRAME = 1 / 60;
const ONE_HOSTILE: LevelDescriptor = { obstacleCount: 0, hostileTarget: 1, timeLimit: 60 };

function encounter(player: { x: number; y: number }, hostile: { x: number; y: number }, heading: number): LevelWorld {
  const world = createLevelWorld(ONE_HOSTILE, scriptedRandom([]), new IdSequence(), () => borderField());
  world.player.position = { x: player.x, y: player.y };
  world.hostiles.push(createHostileCraft('hostile-test', hostile, heading));
  return world;
}

test('a distant patrol keeps cycling cardinal headings without sighting the pilot', () => {
  const world = encounter({ x: 150, y: 300 }, { x: 650, y: 300 }, 0);
  const random = scriptedRandom([0, 0.5, 0.3, 0.5, 0.8, 0.5], { cycle: true });
  const ids = new IdSequence();
  const [hostile] = world.hostiles;
  const targets = new Set<number>();
  const fired: SimulationEvent[] = [];

  for (let tick = 0; tick < 600; tick += 1) {
    const events: SimulationEvent[] = [];
    const { outcome } = stepWorld(world, { fireHeld: false }, FRAME, { random, ids }, events);
    fired.push(...events.filter((event) => event.type === 'projectile-fired'));
    assert.strictEqual(outcome.playerHit, null);
    assert.strictEqual(hostile.ai.mode, 'patrol');
    assert.strictEqual(hostile.ai.canSeePlayer, false);
    assert.ok(distance(hostile.position, world.player.position) > 300);
    targets.add(hostile.ai.targetHeading);
  }

  assert.deepStrictEqual([...targets].sort((a, b) => a - b), [0, 90, 270]);
  assert.deepStrictEqual(fired, []);
  assert.strictEqual(world.hostiles.length, 1);
});

test('a homing hostile fires its first shot at the pilot once the fire delay elapses', () => {
  const player = { x: 400, y: 300 };
  const origin = { x: 280, y: 210 };
  const world = encounter(player, origin, bearing(origin, player));
  const random = scriptedRandom([]);
  const ids = new IdSequence();
  const [hostile] = world.hostiles;

  let firstShot: { tick: number; at: { x: number; y: number }; heading: number } | null = null;
  for (let tick = 1; tick <= 70 && !firstShot; tick += 1) {
    const events: SimulationEvent[] = [];
    stepWorld(world, { fireHeld: false }, FRAME, { random, ids }, events);
    assert.strictEqual(hostile.ai.mode, 'homing');
    for (const event of events) {
      if (event.type === 'projectile-fired' && event.side === 'hostile') {
        firstShot = { tick, at: event.at, heading: event.heading };
        break;
      }
    }
  }

  assert.ok(firstShot);
  assert.ok(firstShot.tick === 60 || firstShot.tick === 61, `first shot on tick ${firstShot.tick}`);
  assert.ok(Math.abs(shortestAngleDiff(firstShot.heading, bearing(firstShot.at, player))) < 1e-6);
  assert.strictEqual(world.hostileProjectiles.length, 1);
});

test('a point-blank shot destroys the hostile once and scores it', () => {
  const session = new SessionController({
    levels: [{ obstacleCount: 0, hostileTarget: 0, timeLimit: 60 }],
    random: scriptedRandom([]),
    cameraJitter: () => 0.5,
    fieldFactory: () => borderField()
  });
  session.activate('start');
  session.tick(0.7);
  session.activate('continue');
  session.startLevel();
  session.tick(0.25);

  const { world } = session;
  world.player.position = { x: 300, y: 300 };
  world.player.heading = 0;
  world.hostiles.push(createHostileCraft('hostile-test', { x: 350, y: 300 }, 0));
  assert.strictEqual(session.setFireHeld(true), true);

  const destroyed: SimulationEvent[] = [];
  for (let tick = 1; tick <= 5; tick += 1) {
    const events = session.tick(FRAME);
    destroyed.push(...events.filter((event) => event.type === 'hostile-destroyed'));
    assert.strictEqual(session.score, tick < 5 ? 0 : 100, `score after tick ${tick}`);
  }

  assert.deepStrictEqual(destroyed, [
    { type: 'hostile-destroyed', id: 'hostile-test', projectileId: 'shot-3', at: { x: 357.5, y: 300 } }
  ]);
  assert.strictEqual(session.kills, 1);
  assert.strictEqual(session.levelKills, 1);
  assert.strictEqual(world.hostiles.length, 0);

  for (let tick = 0; tick < 30; tick += 1) {
    session.tick(FRAME);
  }
  assert.strictEqual(session.score, 100);
  assert.strictEqual(session.phase, 'playing');
});
