// types.ts
// Summary: Server-side records shared by the HTTP API layer, the high-score store and the sortie room.
// Structure: High-score ledger entry -> resolved server configuration.
// Usage: import type { HighScoreEntry, ServerConfig } from './types.js';
// ---------------------------------------------------------------------------

export interface HighScoreEntry {
  name: string;
  score: number;
  level: number;
  /** Local wall-clock time formatted as `YYYY-MM-DD HH:MM`. */
  date: string;
}

export interface ServerConfig {
  port: number;
  adminPassword: string;
  /** Directory holding levels.json and highscores.csv. */
  dataDir: string;
  /** Simulation ticks per second; each tick advances the session by 1 / tickRate seconds. */
  tickRate: number;
  /** Optional seed for reproducible obstacle layouts and AI draws. */
  seed: string | null;
}
