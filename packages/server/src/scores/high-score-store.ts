// high-score-store.ts
// Summary: CSV-backed high-score ledger. Keeps the best entries sorted by score (stable for ties), loads
//          leniently from disk, and saves through a temp file plus rename with a .bak copy of the previous
//          ledger. Writes are serialised so concurrent submissions never interleave.
// Structure: CSV field codec -> row parsing -> HighScoreStore (load/list/submit/clear) -> file helpers.
// Usage: const store = new HighScoreStore(path.join(dataDir, 'highscores.csv')); await store.load();
//        await store.submit('ACE', 2400, 4);
// ---------------------------------------------------------------------------

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SESSION } from '@wingmaze/shared';

import type { HighScoreEntry } from '../types.js';

const FIELD_COUNT = 4;

export interface HighScoreStoreOptions {
  now?: () => Date;
  limit?: number;
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Splits CSV text into records of raw fields, honouring quoted fields that span commas and newlines. */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (ch === '\r' && text[i + 1] === '\n') i += 1;
    } else {
      field += ch;
    }
    i += 1;
  }
  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records.filter((fields) => !(fields.length === 1 && fields[0] === ''));
}

export function formatCsv(entries: readonly HighScoreEntry[]): string {
  return entries
    .map((entry) =>
      [entry.name, String(entry.score), String(entry.level), entry.date].map(escapeField).join(',')
    )
    .map((line) => `${line}\n`)
    .join('');
}

function toEntry(fields: readonly string[]): HighScoreEntry | null {
  if (fields.length !== FIELD_COUNT) return null;
  const [name, rawScore, rawLevel, date] = fields;
  if (!/^-?\d+$/.test(rawScore.trim()) || !/^-?\d+$/.test(rawLevel.trim())) return null;
  return { name, score: Number.parseInt(rawScore, 10), level: Number.parseInt(rawLevel, 10), date };
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function rankEntries(entries: readonly HighScoreEntry[], limit: number): HighScoreEntry[] {
  // Array.prototype.sort is stable, so equal scores keep their insertion order.
  return [...entries].sort((a, b) => b.score - a.score).slice(0, limit);
}

export class HighScoreStore {
  private entries: HighScoreEntry[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private readonly now: () => Date;
  private readonly limit: number;

  constructor(private readonly file: string, options: HighScoreStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.limit = options.limit ?? SESSION.highScoreLimit;
  }

  /** Reads the ledger from disk; a missing or unreadable file yields an empty ledger. */
  async load(): Promise<HighScoreEntry[]> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        console.log(`No high-score file at ${this.file}, starting with an empty ledger`);
      } else {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Failed to read ${this.file}:`, message);
      }
      this.entries = [];
      return this.list();
    }

    const parsed: HighScoreEntry[] = [];
    let skipped = 0;
    for (const fields of parseCsv(text)) {
      const entry = toEntry(fields);
      if (entry) {
        parsed.push(entry);
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      console.warn(`Skipped ${skipped} malformed high-score row(s) in ${this.file}`);
    }
    this.entries = rankEntries(parsed, this.limit);
    return this.list();
  }

  list(): HighScoreEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Records a finished run, keeps the top entries and persists the ledger. */
  async submit(name: string, score: number, level: number): Promise<HighScoreEntry[]> {
    const entry: HighScoreEntry = { name, score, level, date: formatTimestamp(this.now()) };
    this.entries = rankEntries([...this.entries, entry], this.limit);
    await this.enqueueSave();
    return this.list();
  }

  async clear(): Promise<void> {
    this.entries = [];
    await this.enqueueSave();
  }

  private enqueueSave(): Promise<void> {
    const snapshot = formatCsv(this.entries);
    const next = this.writeChain.then(() => this.writeFile(snapshot));
    // A failed write must not stall later ones; the caller still sees the rejection.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async writeFile(contents: string): Promise<void> {
    const tmp = `${this.file}.tmp`;
    const bak = `${this.file}.bak`;
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(tmp, contents, 'utf8');
    try {
      await fs.copyFile(this.file, bak);
    } catch (copyErr) {
      if (!isMissingFile(copyErr)) {
        const copyMsg = copyErr instanceof Error ? copyErr.message : String(copyErr);
        console.warn(`Could not back up ${this.file}:`, copyMsg);
      }
    }
    try {
      await fs.rename(tmp, this.file);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Failed to write ${this.file}:`, message);
      throw err;
    }
  }
}
