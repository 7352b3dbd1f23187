import { Cell, EmptyCell, GameSnapshot, Grid, MarkerCell, NumberCell, WireCell, WireGrid } from './types';
import { MIN_GRID_SIZE, WIRE_EMPTY, WIRE_MARKER } from '../constants';
import { createStateCorruptionError } from '../errors';

export const EMPTY: EmptyCell = Object.freeze({ kind: 'empty' });
export const MARKER: MarkerCell = Object.freeze({ kind: 'marker' });

export function numberCell(value: number): NumberCell {
  return { kind: 'number', value };
}

export function isPowerOfTwoTile(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 2 && Number.isInteger(Math.log2(value));
}

export function cellEquals(a: Cell, b: Cell): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'number' && b.kind === 'number') return a.value === b.value;
  return true;
}

export function createEmptyGrid(size: number): Grid {
  return Array.from({ length: size }, () => Array.from({ length: size }, (): Cell => EMPTY));
}

export function toWireCell(cell: Cell): WireCell {
  switch (cell.kind) {
    case 'empty':
      return WIRE_EMPTY;
    case 'marker':
      return WIRE_MARKER;
    case 'number':
      return cell.value;
  }
}

export function toWireGrid(grid: Grid): WireGrid {
  return grid.map((row) => row.map(toWireCell));
}

/**
 * Parse one wire cell, throwing STATE_CORRUPTION for anything unrecognised
 */
export function fromWireCell(value: unknown, row: number, col: number): Cell {
  if (value === WIRE_EMPTY) return EMPTY;
  if (value === WIRE_MARKER) return MARKER;
  if (typeof value === 'number' && isPowerOfTwoTile(value)) return numberCell(value);
  throw createStateCorruptionError(`unrecognized cell value at (${row}, ${col})`, { row, col, value });
}

/**
 * Parse a wire grid, checking it is square with side `size`
 */
export function fromWireGrid(raw: unknown, size: number): Grid {
  if (!Array.isArray(raw) || raw.length !== size) {
    throw createStateCorruptionError(`grid must have ${size} rows`, { size });
  }
  return raw.map((row: unknown, r: number) => {
    if (!Array.isArray(row) || row.length !== size) {
      throw createStateCorruptionError(`row ${r} must have ${size} cells`, { size, row: r });
    }
    return row.map((value: unknown, c: number) => fromWireCell(value, r, c));
  });
}

/**
 * Structural check of an in-memory grid before the engine touches it
 */
export function assertGridShape(grid: Grid, size: number): void {
  if (!Number.isInteger(size) || size < MIN_GRID_SIZE) {
    throw createStateCorruptionError(`invalid size ${size}`, { size });
  }
  if (grid.length !== size) {
    throw createStateCorruptionError(`grid must have ${size} rows`, { size, rows: grid.length });
  }
  for (let r = 0; r < size; r++) {
    const row = grid[r];
    if (row.length !== size) {
      throw createStateCorruptionError(`row ${r} must have ${size} cells`, { size, row: r });
    }
    for (let c = 0; c < size; c++) {
      const cell = row[c];
      const valid =
        cell.kind === 'empty' ||
        cell.kind === 'marker' ||
        (cell.kind === 'number' && isPowerOfTwoTile(cell.value));
      if (!valid) {
        throw createStateCorruptionError(`unrecognized cell at (${r}, ${c})`, { row: r, col: c });
      }
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Validate an untrusted snapshot (save file, client payload) and return it typed
 */
export function parseSnapshot(raw: unknown): GameSnapshot {
  if (!isRecord(raw)) {
    throw createStateCorruptionError('snapshot must be an object');
  }
  const size = raw.size;
  if (!isNonNegativeInteger(size) || size < MIN_GRID_SIZE) {
    throw createStateCorruptionError('size must be an integer >= 2', { size });
  }
  const grid = toWireGrid(fromWireGrid(raw.grid, size));

  for (const field of ['score', 'high_score', 'moves'] as const) {
    if (raw[field] !== undefined && !isNonNegativeInteger(raw[field])) {
      throw createStateCorruptionError(`${field} must be a non-negative integer`, { field });
    }
  }
  for (const field of ['game_over', 'won'] as const) {
    if (raw[field] !== undefined && typeof raw[field] !== 'boolean') {
      throw createStateCorruptionError(`${field} must be a boolean`, { field });
    }
  }

  const numberOr = (value: unknown): number => (isNonNegativeInteger(value) ? value : 0);
  return {
    grid,
    size,
    score: numberOr(raw.score),
    high_score: numberOr(raw.high_score),
    moves: numberOr(raw.moves),
    game_over: raw.game_over === true,
    won: raw.won === true,
    max_tile: numberOr(raw.max_tile),
  };
}

export function cloneSnapshot(snapshot: GameSnapshot): GameSnapshot {
  return { ...snapshot, grid: snapshot.grid.map((row) => row.slice()) };
}
