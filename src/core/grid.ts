import type { ComponentKind, GridCell, GridCoord, GridError, ReactorGrid, Result } from './types.js';
import { fail, ok } from './types.js';

// ─── Reactor grid: pure spatial occupancy index ────────────────────────────

export function createGrid(width: number, height: number, layers: number): ReactorGrid {
  const w = clampDimension(width);
  const h = clampDimension(height);
  const l = clampDimension(layers);
  return { width: w, height: h, layers: l, cells: new Array<GridCell | null>(w * h * l).fill(null) };
}

function clampDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1;
}

export function coord(x: number, y: number, z = 0): GridCoord {
  return { x, y, z };
}

export function sameCoord(a: GridCoord, b: GridCoord): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/** Lexicographic (z, y, x) ordering used for iteration and serialization. */
export function compareCoords(a: GridCoord, b: GridCoord): number {
  return a.z - b.z || a.y - b.y || a.x - b.x;
}

export function coordKey(c: GridCoord): string {
  return `${c.x},${c.y},${c.z}`;
}

export function inBounds(grid: ReactorGrid, c: GridCoord): boolean {
  return (
    Number.isInteger(c.x) &&
    Number.isInteger(c.y) &&
    Number.isInteger(c.z) &&
    c.x >= 0 &&
    c.y >= 0 &&
    c.z >= 0 &&
    c.x < grid.width &&
    c.y < grid.height &&
    c.z < grid.layers
  );
}

function cellIndex(grid: ReactorGrid, c: GridCoord): number | null {
  if (!inBounds(grid, c)) return null;
  return (c.z * grid.height + c.y) * grid.width + c.x;
}

/** Overwrites any occupant. List-side bookkeeping is the caller's job. */
export function placeCell(grid: ReactorGrid, c: GridCoord, cell: GridCell): Result<void> {
  const index = cellIndex(grid, c);
  if (index === null) return fail<GridError>({ kind: 'out_of_bounds', coord: c });
  grid.cells[index] = cell;
  return ok(undefined);
}

export function clearCell(grid: ReactorGrid, c: GridCoord): Result<void> {
  const index = cellIndex(grid, c);
  if (index === null) return fail<GridError>({ kind: 'out_of_bounds', coord: c });
  grid.cells[index] = null;
  return ok(undefined);
}

export function getCell(grid: ReactorGrid, c: GridCoord): GridCell | null {
  const index = cellIndex(grid, c);
  if (index === null) return null;
  return grid.cells[index] ?? null;
}

export function getKind(grid: ReactorGrid, c: GridCoord): ComponentKind | null {
  return getCell(grid, c)?.kind ?? null;
}

export function clearGrid(grid: ReactorGrid): void {
  grid.cells.fill(null);
}

/** In-layer axis neighbours, ordered x-1, x+1, y-1, y+1. */
export function neighborCoords(grid: ReactorGrid, c: GridCoord): GridCoord[] {
  const out: GridCoord[] = [];
  if (c.x > 0) out.push({ x: c.x - 1, y: c.y, z: c.z });
  if (c.x < grid.width - 1) out.push({ x: c.x + 1, y: c.y, z: c.z });
  if (c.y > 0) out.push({ x: c.x, y: c.y - 1, z: c.z });
  if (c.y < grid.height - 1) out.push({ x: c.x, y: c.y + 1, z: c.z });
  return out;
}

export function iterateCoords(grid: ReactorGrid): GridCoord[] {
  const out: GridCoord[] = [];
  for (let z = 0; z < grid.layers; z++) {
    for (let y = 0; y < grid.height; y++) {
      for (let x = 0; x < grid.width; x++) {
        out.push({ x, y, z });
      }
    }
  }
  return out;
}

export function occupiedCount(grid: ReactorGrid): number {
  return grid.cells.reduce((n, cell) => (cell ? n + 1 : n), 0);
}
