// commands.ts
// Summary: Decoders for client command payloads. Each returns a typed intent or null so the room can drop
//          malformed messages without touching the session.
// Structure: literal matching helper -> one decoder per GAME_COMMAND channel.
// Usage: const intent = decodeMovement(message); if (intent) session.setMovement(intent.direction, intent.active);
// ---------------------------------------------------------------------------

import {
  BUTTON_IDS,
  MOVEMENT_DIRECTIONS,
  NAME_ENTRY_KINDS,
  isRecord,
  type ButtonId,
  type MovementDirection,
  type NameEntryKind,
  type Vec2
} from '@wingmaze/shared';

export interface MovementCommand {
  direction: MovementDirection;
  active: boolean;
}

export interface NameEntryCommand {
  kind: NameEntryKind;
  char?: string;
}

function matchLiteral<T extends string>(options: readonly T[], value: unknown): T | null {
  return options.find((option) => option === value) ?? null;
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function decodeMovement(payload: unknown): MovementCommand | null {
  if (!isRecord(payload) || typeof payload.active !== 'boolean') return null;
  const direction = matchLiteral(MOVEMENT_DIRECTIONS, payload.direction);
  return direction ? { direction, active: payload.active } : null;
}

/** Accepts `{ held }` or a bare boolean. */
export function decodeFire(payload: unknown): boolean | null {
  if (typeof payload === 'boolean') return payload;
  if (isRecord(payload) && typeof payload.held === 'boolean') return payload.held;
  return null;
}

export function decodePointer(payload: unknown): Vec2 | null {
  if (!isRecord(payload)) return null;
  const x = toFiniteNumber(payload.x);
  const y = toFiniteNumber(payload.y);
  return x !== null && y !== null ? { x, y } : null;
}

/** Accepts `{ id }` or a bare button id string. */
export function decodeButton(payload: unknown): ButtonId | null {
  if (typeof payload === 'string') return matchLiteral(BUTTON_IDS, payload);
  return isRecord(payload) ? matchLiteral(BUTTON_IDS, payload.id) : null;
}

export function decodeNameEntry(payload: unknown): NameEntryCommand | null {
  if (!isRecord(payload)) return null;
  const kind = matchLiteral(NAME_ENTRY_KINDS, payload.kind);
  if (!kind) return null;
  if (kind !== 'char') return { kind };
  return typeof payload.char === 'string' ? { kind, char: payload.char } : null;
}
