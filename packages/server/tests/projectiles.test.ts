// projectiles.test.ts
// Summary: Projectile stepping, wall impacts without committing the move, off-field removal after the
//          move, and trail pacing.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';
import type { SimulationEvent } from '@wingmaze/shared';

import { advanceProjectile, advanceProjectiles, createProjectile, isOffField } from '../src/game/projectiles.js';
import { borderField, openField } from './helpers.js';

test('projectiles advance by their side speed along the heading', () => {
  const events: SimulationEvent[] = [];
  const friendly = createProjectile('shot-1', 'friendly', { x: 100, y: 100 }, 0);
  const hostile = createProjectile('bolt-1', 'hostile', { x: 100, y: 100 }, 0);
  assert.deepStrictEqual(advanceProjectile(friendly, openField(), 0.01, events), { removed: false });
  advanceProjectile(hostile, openField(), 0.01, events);
  assert.deepStrictEqual(friendly.position, { x: 108, y: 100 });
  assert.deepStrictEqual(hostile.position, { x: 105, y: 100 });
  assert.deepStrictEqual(events, []);
});

test('a candidate inside a cell destroys the projectile in place', () => {
  const events: SimulationEvent[] = [];
  const shot = createProjectile('shot-1', 'friendly', { x: 760, y: 300 }, 0);
  const result = advanceProjectile(shot, borderField(), 0.01, events);
  assert.deepStrictEqual(result, { removed: true, reason: 'wall' });
  assert.deepStrictEqual(shot.position, { x: 760, y: 300 });
  assert.deepStrictEqual(events, [{ type: 'wall-impact', side: 'friendly', id: 'shot-1', at: { x: 768, y: 300 } }]);
});

test('leaving the field removes the projectile after it moves', () => {
  const events: SimulationEvent[] = [];
  const shot = createProjectile('shot-1', 'friendly', { x: 796, y: 300 }, 0);
  assert.deepStrictEqual(advanceProjectile(shot, openField(), 0.01, events), { removed: true, reason: 'off-field' });
  assert.deepStrictEqual(shot.position, { x: 804, y: 300 });
  assert.strictEqual(isOffField({ x: 800, y: 600 }, openField()), false);
  assert.strictEqual(isOffField({ x: -0.5, y: 10 }, openField()), true);
});

test('trails are emitted at the pre-move position every interval', () => {
  const events: SimulationEvent[] = [];
  const shot = createProjectile('shot-1', 'friendly', { x: 100, y: 100 }, 0);
  for (let i = 0; i < 3; i += 1) {
    advanceProjectile(shot, openField(), 0.02, events);
  }
  assert.deepStrictEqual(events, [{ type: 'trail', side: 'friendly', at: { x: 116, y: 100 } }]);
  assert.strictEqual(shot.trailTimer, 0);
});

test('advanceProjectiles keeps survivors in order', () => {
  const events: SimulationEvent[] = [];
  const survivors = advanceProjectiles(
    [
      createProjectile('shot-1', 'friendly', { x: 100, y: 100 }, 0),
      createProjectile('shot-2', 'friendly', { x: 796, y: 300 }, 0),
      createProjectile('shot-3', 'friendly', { x: 200, y: 200 }, 0)
    ],
    openField(),
    0.01,
    events
  );
  assert.deepStrictEqual(
    survivors.map((shot) => shot.id),
    ['shot-1', 'shot-3']
  );
});
