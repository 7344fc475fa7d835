// geometry.ts
// Summary: Planar math helpers for the simulation: degree headings, bearings, shortest angular differences
//          and inclusive cell rectangle tests.
// Structure: Angle helpers -> distance/bearing -> cell bounds.
// Usage: import { shortestAngleDiff, bearing } from './geometry.js';
// ---------------------------------------------------------------------------

import type { Vec2 } from '@wingmaze/shared';

export interface CellBounds {
  readonly left: number;
  readonly right: number;
  readonly bottom: number;
  readonly top: number;
}

const DEG_TO_RAD = Math.PI / 180;

export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/** Wraps any angle into [0, 360). */
export function normalizeHeading(degrees: number): number {
  if (!Number.isFinite(degrees)) return 0;
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/** Signed difference `to - from` folded into (-180, 180]. */
export function shortestAngleDiff(from: number, to: number): number {
  const diff = normalizeHeading(to - from);
  return diff > 180 ? diff - 360 : diff;
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/** Heading in degrees from `from` towards `to`; coincident points give 0. */
export function bearing(from: Vec2, to: Vec2): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (dx === 0 && dy === 0) return 0;
  return Math.atan2(dy, dx) / DEG_TO_RAD;
}

/** Unit step of `speed` along a degree heading. */
export function headingVector(headingDegrees: number, speed: number): Vec2 {
  const radians = toRadians(headingDegrees);
  return { x: Math.cos(radians) * speed, y: Math.sin(radians) * speed };
}

export function cellBounds(cell: { readonly x: number; readonly y: number; readonly size: number }): CellBounds {
  const half = cell.size / 2;
  return {
    left: cell.x - half,
    right: cell.x + half,
    bottom: cell.y - half,
    top: cell.y + half
  };
}

/** Inclusive point-in-rectangle test, optionally inflated by `margin` on every side. */
export function pointInBounds(point: Vec2, bounds: CellBounds, margin = 0): boolean {
  return (
    bounds.left - margin <= point.x &&
    point.x <= bounds.right + margin &&
    bounds.bottom - margin <= point.y &&
    point.y <= bounds.top + margin
  );
}
