// config.ts
// Summary: Environment-driven server configuration plus the level table loader. Values are read once at
//          start-up; malformed numbers fall back to their defaults instead of aborting the boot.
// Structure: defaults -> numeric parsing helpers -> loadServerConfig -> loadLevelTable.
// Usage: const config = loadServerConfig(process.env);
//        const levels = await loadLevelTable(path.join(config.dataDir, 'levels.json'));
// ---------------------------------------------------------------------------

import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { DEFAULT_LEVELS, sanitizeLevelTable, type LevelDescriptor } from '@wingmaze/shared';

import type { ServerConfig } from './types.js';

const moduleDir = new URL('.', import.meta.url);
// Compiled output sits one directory deeper (dist/packages/server/src).
const projectRootUrl = moduleDir.pathname.includes('/dist/')
  ? new URL('../../../../', moduleDir)
  : new URL('../../../', moduleDir);

export const DEFAULT_PORT = 3000;
export const DEFAULT_ADMIN_PASSWORD = 'adminpass';
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('./data/', projectRootUrl));
export const DEFAULT_TICK_RATE = 60;
export const MIN_TICK_RATE = 10;
export const MAX_TICK_RATE = 240;

function parseInteger(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isInteger(value) ? value : null;
}

function parsePort(raw: string | undefined): number {
  const value = parseInteger(raw);
  return value !== null && value > 0 && value < 65536 ? value : DEFAULT_PORT;
}

function parseTickRate(raw: string | undefined): number {
  const value = parseInteger(raw);
  if (value === null) return DEFAULT_TICK_RATE;
  return Math.min(MAX_TICK_RATE, Math.max(MIN_TICK_RATE, value));
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const seed = env.WINGMAZE_SEED?.trim();
  const dataDir = env.WINGMAZE_DATA_DIR?.trim();
  return {
    port: parsePort(env.PORT),
    adminPassword: env.ADMIN_PASSWORD || DEFAULT_ADMIN_PASSWORD,
    dataDir: dataDir ? dataDir : DEFAULT_DATA_DIR,
    tickRate: parseTickRate(env.WINGMAZE_TICK_RATE),
    seed: seed ? seed : null
  };
}

/** Reads and sanitises the level table; a missing or unparsable file yields the reference table. */
export async function loadLevelTable(file: string): Promise<LevelDescriptor[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Failed to read level table ${file}, using defaults:`, message);
    return DEFAULT_LEVELS.map((level) => ({ ...level }));
  }
  try {
    const raw: unknown = JSON.parse(text);
    return sanitizeLevelTable(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Level table ${file} is not valid JSON, using defaults:`, message);
    return DEFAULT_LEVELS.map((level) => ({ ...level }));
  }
}
