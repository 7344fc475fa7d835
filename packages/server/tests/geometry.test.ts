// geometry.test.ts
// Summary: Heading normalisation, shortest angular differences, bearings and inclusive cell bounds.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';

import {
  bearing,
  cellBounds,
  headingVector,
  normalizeHeading,
  pointInBounds,
  shortestAngleDiff
} from '../src/game/geometry.js';

test('normalizeHeading wraps into [0, 360)', () => {
  assert.strictEqual(normalizeHeading(-90), 270);
  assert.strictEqual(normalizeHeading(360), 0);
  assert.strictEqual(normalizeHeading(725), 5);
  assert.strictEqual(normalizeHeading(Number.NaN), 0);
});

test('shortestAngleDiff picks the short way round', () => {
  assert.strictEqual(shortestAngleDiff(350, 10), 20);
  assert.strictEqual(shortestAngleDiff(10, 350), -20);
  assert.strictEqual(shortestAngleDiff(0, 180), 180);
  assert.strictEqual(shortestAngleDiff(90, 90), 0);
});

test('bearing follows atan2 and is zero for coincident points', () => {
  assert.strictEqual(bearing({ x: 0, y: 0 }, { x: 10, y: 0 }), 0);
  assert.ok(Math.abs(bearing({ x: 0, y: 0 }, { x: 0, y: 10 }) - 90) < 1e-9);
  assert.ok(Math.abs(bearing({ x: 0, y: 0 }, { x: -10, y: 0 }) - 180) < 1e-9);
  assert.strictEqual(bearing({ x: 5, y: 5 }, { x: 5, y: 5 }), 0);
});

test('headingVector scales the unit direction', () => {
  const step = headingVector(0, 8);
  assert.strictEqual(step.x, 8);
  assert.strictEqual(step.y, 0);
  const down = headingVector(90, 3);
  assert.ok(Math.abs(down.x) < 1e-12);
  assert.ok(Math.abs(down.y - 3) < 1e-12);
});

test('cell bounds are inclusive and can be inflated', () => {
  const bounds = cellBounds({ x: 100, y: 100, size: 32 });
  assert.deepStrictEqual(bounds, { left: 84, right: 116, bottom: 84, top: 116 });
  assert.strictEqual(pointInBounds({ x: 116, y: 84 }, bounds), true);
  assert.strictEqual(pointInBounds({ x: 116.5, y: 100 }, bounds), false);
  assert.strictEqual(pointInBounds({ x: 126, y: 100 }, bounds, 10), true);
});
