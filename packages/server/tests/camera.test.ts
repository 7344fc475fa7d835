// camera.test.ts
// Summary: Follow camera easing, scroll clamping, shake decay and screen-to-world pointer mapping.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';

import { Camera } from '../src/game/camera.js';

const VIEW = { width: 800, height: 600 };

function near(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${expected}, got ${actual}`);
}

test('eases a tenth of the way towards the pilot each update', () => {
  const camera = new Camera(VIEW, VIEW, () => 0.5);
  camera.update({ x: 700, y: 500 }, 1 / 60);
  near(camera.offset.x, 30);
  near(camera.offset.y, 20);
  camera.update({ x: 700, y: 500 }, 1 / 60);
  near(camera.offset.x, 57);
  near(camera.offset.y, 38);
});

test('clamps the scroll target to the scroll range', () => {
  const camera = new Camera(VIEW, VIEW, () => 0.5);
  camera.update({ x: 100, y: 50 }, 1 / 60);
  assert.deepStrictEqual(camera.offset, { x: 0, y: 0 });
  camera.update({ x: 2000, y: 2000 }, 1 / 60);
  near(camera.offset.x, 80);
  near(camera.offset.y, 60);
});

test('shake jitters the target and decays', () => {
  const camera = new Camera(VIEW, VIEW, () => 1);
  camera.shake(10, 0.5);
  camera.update({ x: 400, y: 300 }, 0.1);
  near(camera.offset.x, 0.9);
  near(camera.offset.y, 0.9);

  const settled = new Camera(VIEW, VIEW, () => 1);
  settled.shake(10, 0.05);
  settled.update({ x: 400, y: 300 }, 0.1);
  settled.update({ x: 400, y: 300 }, 0.1);
  const before = settled.offset;
  settled.update({ x: 400, y: 300 }, 0.1);
  near(settled.offset.x, before.x * 0.9);
});

test('a missing target leaves the offset alone', () => {
  const camera = new Camera(VIEW, VIEW, () => 0.5);
  camera.update({ x: 700, y: 500 }, 1 / 60);
  camera.update(null, 1 / 60);
  near(camera.offset.x, 30);
});

test('maps screen points into world space', () => {
  const camera = new Camera(VIEW, VIEW, () => 0.5);
  camera.update({ x: 700, y: 500 }, 1 / 60);
  const world = camera.toWorld({ x: 10, y: 20 });
  near(world.x, 40);
  near(world.y, 40);
});
