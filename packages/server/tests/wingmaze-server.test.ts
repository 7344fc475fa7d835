// wingmaze-server.test.ts
// Summary: Exercises the HTTP API against a live server on a random port: level table, high-score listing,
//          admin login/status/logout and the admin-only ledger reset.
// Structure: temp data dir + env -> import and start server -> fetch routes -> close in test.after.
// Usage: Executed via `npm test` (node --test with the tsx loader).
// ---------------------------------------------------------------------------
import test from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wingmaze-server-'));
await fs.writeFile(
  path.join(dataDir, 'levels.json'),
  JSON.stringify({ levels: [{ obstacleCount: 2, hostileTarget: 9, timeLimit: 15 }, { obstacleCount: 'many' }] }),
  'utf8'
);
await fs.writeFile(path.join(dataDir, 'highscores.csv'), 'Ace,500,4,2026-01-02 03:04\n', 'utf8');

process.env.PORT = '0'; // use random available port
process.env.WINGMAZE_DATA_DIR = dataDir;
process.env.ADMIN_PASSWORD = 'test-secret';
const { server } = await import('../src/wingmaze-server.js');
await new Promise<void>((resolve, reject) => {
  const onError = (error: Error) => {
    server.off('error', onError);
    reject(error);
  };
  server.once('error', onError);
  server.listen(0, () => {
    server.off('error', onError);
    resolve();
  });
});
const address = server.address();
const port = typeof address === 'object' && address !== null ? address.port : 0;
const base = `http://localhost:${port}`;

test.after(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
});

function login(password: string): Promise<Response> {
  return fetch(`${base}/admin/login`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ password })
  });
}

test('level table is served sanitised', async () => {
  const res = await fetch(`${base}/api/levels`);
  assert.strictEqual(res.status, 200);
  assert.deepStrictEqual(await res.json(), [{ obstacleCount: 2, hostileTarget: 6, timeLimit: 15 }]);
});

test('high scores are loaded from the data directory', async () => {
  const res = await fetch(`${base}/api/highscores`);
  assert.deepStrictEqual(await res.json(), [{ name: 'Ace', score: 500, level: 4, date: '2026-01-02 03:04' }]);
});

test('a wrong password is refused', async () => {
  const res = await login('wrong');
  assert.strictEqual(res.status, 403);
  assert.deepStrictEqual(await res.json(), { error: 'bad password' });
  assert.strictEqual(res.headers.get('set-cookie'), null);
});

test('clearing high scores requires the admin cookie', async () => {
  const anonymous = await fetch(`${base}/api/highscores`, { method: 'DELETE' });
  assert.strictEqual(anonymous.status, 401);
  assert.deepStrictEqual(await anonymous.json(), { error: 'unauthorized' });
  const status = await fetch(`${base}/admin/status`);
  assert.strictEqual(status.status, 401);
  assert.deepStrictEqual(await status.json(), { admin: false });

  const res = await login('test-secret');
  assert.strictEqual(res.status, 200);
  assert.deepStrictEqual(await res.json(), { success: true });
  const cookie = (res.headers.get('set-cookie') ?? '').split(';')[0];
  assert.strictEqual(cookie, 'admin=true');

  const adminStatus = await fetch(`${base}/admin/status`, { headers: { Cookie: cookie } });
  assert.deepStrictEqual(await adminStatus.json(), { admin: true });

  const cleared = await fetch(`${base}/api/highscores`, { method: 'DELETE', headers: { Cookie: cookie } });
  assert.strictEqual(cleared.status, 200);
  assert.deepStrictEqual(await cleared.json(), { success: true });

  const list = await fetch(`${base}/api/highscores`);
  assert.deepStrictEqual(await list.json(), []);
  assert.strictEqual(await fs.readFile(path.join(dataDir, 'highscores.csv'), 'utf8'), '');
});

test('logout clears the admin cookie', async () => {
  const res = await fetch(`${base}/admin/logout`, { method: 'POST' });
  assert.strictEqual(res.status, 200);
  assert.deepStrictEqual(await res.json(), { success: true });
  assert.ok((res.headers.get('set-cookie') ?? '').startsWith('admin=;'));
});
