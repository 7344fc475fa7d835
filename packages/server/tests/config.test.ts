// config.test.ts
// Summary: Environment parsing defaults and clamps, and level table loading with its fallbacks.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_LEVELS } from '@wingmaze/shared';

import {
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_DATA_DIR,
  loadLevelTable,
  loadServerConfig
} from '../src/config.js';

async function tempFile(name: string, contents: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wingmaze-config-'));
  const file = path.join(dir, name);
  await fs.writeFile(file, contents, 'utf8');
  return file;
}

test('an empty environment yields the defaults', () => {
  assert.deepStrictEqual(loadServerConfig({}), {
    port: 3000,
    adminPassword: DEFAULT_ADMIN_PASSWORD,
    dataDir: DEFAULT_DATA_DIR,
    tickRate: 60,
    seed: null
  });
});

test('environment values override the defaults', () => {
  const config = loadServerConfig({
    PORT: '8080',
    ADMIN_PASSWORD: 'test-secret',
    WINGMAZE_DATA_DIR: ' /srv/wingmaze ',
    WINGMAZE_TICK_RATE: '30',
    WINGMAZE_SEED: ' alpha '
  });
  assert.deepStrictEqual(config, {
    port: 8080,
    adminPassword: 'test-secret',
    dataDir: '/srv/wingmaze',
    tickRate: 30,
    seed: 'alpha'
  });
});

test('malformed numbers fall back and tick rates are clamped', () => {
  assert.strictEqual(loadServerConfig({ PORT: 'http' }).port, 3000);
  assert.strictEqual(loadServerConfig({ PORT: '70000' }).port, 3000);
  assert.strictEqual(loadServerConfig({ PORT: '0' }).port, 3000);
  assert.strictEqual(loadServerConfig({ WINGMAZE_TICK_RATE: '12.5' }).tickRate, 60);
  assert.strictEqual(loadServerConfig({ WINGMAZE_TICK_RATE: '1' }).tickRate, 10);
  assert.strictEqual(loadServerConfig({ WINGMAZE_TICK_RATE: '1000' }).tickRate, 240);
  assert.strictEqual(loadServerConfig({ WINGMAZE_SEED: '   ' }).seed, null);
});

test('the bundled level table matches the reference levels', async () => {
  const levels = await loadLevelTable(path.join(DEFAULT_DATA_DIR, 'levels.json'));
  assert.deepStrictEqual(levels, DEFAULT_LEVELS);
});

test('level tables are sanitised', async () => {
  const file = await tempFile(
    'levels.json',
    JSON.stringify([{ obstacleCount: 2, hostileTarget: 9, timeLimit: 15 }, { obstacleCount: 'many' }])
  );
  assert.deepStrictEqual(await loadLevelTable(file), [{ obstacleCount: 2, hostileTarget: 6, timeLimit: 15 }]);
});

test('missing or unparsable level tables fall back to the reference levels', async (t) => {
  const warn = t.mock.method(console, 'warn', () => undefined);
  const broken = await tempFile('levels.json', '{ "levels": [');

  assert.deepStrictEqual(await loadLevelTable(broken), DEFAULT_LEVELS);
  assert.deepStrictEqual(await loadLevelTable(path.join(path.dirname(broken), 'absent.json')), DEFAULT_LEVELS);
  assert.strictEqual(warn.mock.callCount(), 2);
});
