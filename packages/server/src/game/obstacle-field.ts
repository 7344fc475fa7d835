// obstacle-field.ts
// Summary: Builds the static obstacle grid for a level (closed border plus random interior clusters) and
//          the derived set of free spawn points, and answers the blocking queries every other system uses.
// Structure: Field types -> border/cluster generation -> spawn lattice -> point/craft blocking tests ->
//            spawn position fallback search.
// Usage: const field = generateObstacleField({ obstacleCount: 3, random }); isPointBlocked(field.cells, p);
// ---------------------------------------------------------------------------

import { CRAFT, FIELD, type RandomSource, type Vec2 } from '@wingmaze/shared';

import { cellBounds, distance, pointInBounds } from './geometry.js';

export interface ObstacleCell {
  readonly x: number;
  readonly y: number;
  readonly size: number;
}

export interface ObstacleField {
  readonly width: number;
  readonly height: number;
  readonly cellSize: number;
  readonly cells: readonly ObstacleCell[];
  readonly spawnCells: readonly Vec2[];
}

export interface ObstacleFieldOptions {
  readonly obstacleCount: number;
  readonly random: RandomSource;
  readonly width?: number;
  readonly height?: number;
  readonly cellSize?: number;
}

const CLUSTER_MIN_BLOCKS = 1;
const CLUSTER_MAX_BLOCKS = 3;
// Clusters keep three cells of air between themselves and the border.
const CLUSTER_EDGE_MARGIN_CELLS = 3;

class CellCollector {
  private readonly seen = new Set<string>();
  readonly cells: ObstacleCell[] = [];

  constructor(private readonly size: number) {}

  add(x: number, y: number): void {
    const key = `${x}:${y}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.cells.push({ x, y, size: this.size });
  }
}

function addBorder(collector: CellCollector, width: number, height: number, cellSize: number): void {
  const half = cellSize / 2;
  for (let x = half; x <= width - half; x += cellSize) {
    collector.add(x, half);
    collector.add(x, height - half);
  }
  for (let y = half; y <= height - half; y += cellSize) {
    collector.add(half, y);
    collector.add(width - half, y);
  }
}

function addClusters(
  collector: CellCollector,
  options: Required<Omit<ObstacleFieldOptions, 'random'>> & { random: RandomSource }
): void {
  const { width, height, cellSize, obstacleCount, random } = options;
  const half = cellSize / 2;
  const center = { x: width / 2, y: height / 2 };
  const margin = cellSize * CLUSTER_EDGE_MARGIN_CELLS;
  const minCol = Math.ceil((margin - half) / cellSize);
  const minRow = minCol;

  for (let n = 0; n < obstacleCount; n += 1) {
    const widthBlocks = random.int(CLUSTER_MIN_BLOCKS, CLUSTER_MAX_BLOCKS);
    const heightBlocks = random.int(CLUSTER_MIN_BLOCKS, CLUSTER_MAX_BLOCKS);
    const maxCol = Math.floor((width - margin - widthBlocks * cellSize - half) / cellSize);
    const maxRow = Math.floor((height - margin - heightBlocks * cellSize - half) / cellSize);
    if (maxCol < minCol || maxRow < minRow) continue;

    const col = random.int(minCol, maxCol);
    const row = random.int(minRow, maxRow);
    for (let i = 0; i < widthBlocks; i += 1) {
      for (let j = 0; j < heightBlocks; j += 1) {
        const x = half + (col + i) * cellSize;
        const y = half + (row + j) * cellSize;
        if (distance({ x, y }, center) > FIELD.centerClearRadius) {
          collector.add(x, y);
        }
      }
    }
  }
}

/**
 * Lattice points that are outside every cell and at least two player radii from every cell centre.
 * Iterates column-major, so the first entry is the lowest-x free point.
 */
export function computeSpawnCells(
  cells: readonly ObstacleCell[],
  width: number = FIELD.width,
  height: number = FIELD.height,
  spacing: number = FIELD.spawnGridSpacing
): Vec2[] {
  const minWallDistance = CRAFT.playerRadius * 2;
  const free: Vec2[] = [];
  for (let x = spacing / 2; x < width; x += spacing) {
    for (let y = spacing / 2; y < height; y += spacing) {
      const point = { x, y };
      if (isPointBlocked(cells, point)) continue;
      if (cells.some((cell) => distance(point, cell) < minWallDistance)) continue;
      free.push(point);
    }
  }
  return free;
}

export function generateObstacleField(options: ObstacleFieldOptions): ObstacleField {
  const width = options.width ?? FIELD.width;
  const height = options.height ?? FIELD.height;
  const cellSize = options.cellSize ?? FIELD.cellSize;
  const collector = new CellCollector(cellSize);
  addBorder(collector, width, height, cellSize);
  addClusters(collector, {
    width,
    height,
    cellSize,
    obstacleCount: Math.max(0, Math.floor(options.obstacleCount)),
    random: options.random
  });
  const cells = collector.cells;
  return { width, height, cellSize, cells, spawnCells: computeSpawnCells(cells, width, height) };
}

/** Builds a field from explicit cells, e.g. a fixture layout. */
export function createObstacleField(
  cells: readonly ObstacleCell[],
  width: number = FIELD.width,
  height: number = FIELD.height
): ObstacleField {
  return {
    width,
    height,
    cellSize: cells[0]?.size ?? FIELD.cellSize,
    cells,
    spawnCells: computeSpawnCells(cells, width, height)
  };
}

export function isPointBlocked(cells: readonly ObstacleCell[], point: Vec2): boolean {
  return cells.some((cell) => pointInBounds(point, cellBounds(cell)));
}

/**
 * Coarse craft-vs-wall test: the craft is treated as a box of half-extent `radius`, so the cell is
 * inflated by the radius on both axes and compared against the craft centre (strict inequality).
 */
export function blocksCraft(cells: readonly ObstacleCell[], point: Vec2, radius: number): boolean {
  return cells.some((cell) => {
    const reach = cell.size / 2 + radius;
    return Math.abs(point.x - cell.x) < reach && Math.abs(point.y - cell.y) < reach;
  });
}

/** Placement test with inclusive bounds inflated by `clearance`. */
export function isPositionFree(cells: readonly ObstacleCell[], point: Vec2, clearance: number): boolean {
  return !cells.some((cell) => pointInBounds(point, cellBounds(cell), clearance));
}

/**
 * Returns `preferred` when it is free; otherwise the nearest free spawn cell, then the first spawn cell,
 * then `preferred` itself when the lattice is empty.
 */
export function findSpawnPosition(field: ObstacleField, preferred: Vec2, clearance: number): Vec2 {
  if (isPositionFree(field.cells, preferred, clearance)) return preferred;

  let best: Vec2 | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of field.spawnCells) {
    const candidateDistance = distance(candidate, preferred);
    if (candidateDistance < bestDistance && isPositionFree(field.cells, candidate, clearance)) {
      best = candidate;
      bestDistance = candidateDistance;
    }
  }
  return best ?? field.spawnCells[0] ?? preferred;
}
