// wingmaze-server.ts
// Summary: Entry point for the Wingmaze server. Hosts an Express HTTP API for the high-score ledger and
//          level table alongside the Colyseus transport that runs one sortie room per pilot.
// Structure: configuration -> data loading -> Express setup -> admin auth -> API routes -> Colyseus
//            bootstrap -> server start.
// Usage: Run with `npm start` (tsx executes this file directly); set PORT, ADMIN_PASSWORD,
//        WINGMAZE_DATA_DIR, WINGMAZE_TICK_RATE or WINGMAZE_SEED to override defaults.
// ---------------------------------------------------------------------------

import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Server as ColyseusServer } from '@colyseus/core';
import { WebSocketTransport } from '@colyseus/ws-transport';
import cookieParser from 'cookie-parser';
import { isRecord } from '@wingmaze/shared';

import { loadLevelTable, loadServerConfig } from './config.js';
import { SortieRoom } from './game/sortie-room.js';
import { HighScoreStore } from './scores/high-score-store.js';

const __filename = fileURLToPath(import.meta.url);

// Configuration
const config = loadServerConfig(process.env);
const levels = await loadLevelTable(path.join(config.dataDir, 'levels.json'));
const scores = new HighScoreStore(path.join(config.dataDir, 'highscores.csv'));
await scores.load();
console.log(`Loaded ${levels.length} level(s) and ${scores.list().length} high score(s) from ${config.dataDir}`);

const app = express();
const server = http.createServer(app);
const gameServer = new ColyseusServer({
  transport: new WebSocketTransport({
    server,
    path: '/colyseus'
  })
});

gameServer.define('sortie', SortieRoom, {
  dependencies: {
    levels,
    tickRate: config.tickRate,
    seed: config.seed,
    scores
  }
});

// Middleware: parsers must run before routes that read cookies or body data
app.use(express.json());
app.use(express.urlencoded({ extended: false }));
app.use(cookieParser());

function isAdmin(req: Request): boolean {
  return req.cookies?.admin === 'true';
}

// Admin authentication middleware
function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (isAdmin(req)) {
    next();
    return;
  }
  res.status(401).json({ error: 'unauthorized' });
}

app.post('/admin/login', (req: Request, res: Response) => {
  const body: unknown = req.body;
  const password = isRecord(body) ? body.password : undefined;
  if (password === config.adminPassword) {
    console.log('Admin login successful');
    res.cookie('admin', 'true', {
      httpOnly: true,
      secure: process.env.NODE_ENV === 'production',
      sameSite: 'strict'
    });
    res.json({ success: true });
    return;
  }
  console.warn('Admin login failed');
  res.status(403).json({ error: 'bad password' });
});

app.post('/admin/logout', (_req: Request, res: Response) => {
  res.clearCookie('admin', {
    httpOnly: true,
    secure: process.env.NODE_ENV === 'production',
    sameSite: 'strict'
  });
  res.json({ success: true });
});

app.get('/admin/status', (req: Request, res: Response) => {
  if (isAdmin(req)) {
    res.json({ admin: true });
    return;
  }
  res.status(401).json({ admin: false });
});

app.get('/api/highscores', (_req: Request, res: Response) => {
  res.json(scores.list());
});

app.get('/api/levels', (_req: Request, res: Response) => {
  res.json(levels);
});

app.delete('/api/highscores', requireAdmin, async (_req: Request, res: Response) => {
  try {
    await scores.clear();
    console.log('High-score ledger cleared by admin');
    res.json({ success: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('Failed to clear high scores', message);
    res.status(500).json({ error: 'failed to clear high scores' });
  }
});

if (process.argv[1] === __filename) {
  await gameServer.listen(config.port);
  console.log(`Wingmaze server and Colyseus transport running on port ${config.port}`);
}

export { app, server, gameServer };
