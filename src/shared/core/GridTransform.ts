/**
 * GridTransform - pure grid functions
 *
 * Nothing here touches a GameState or randomness. Every function returns a
 * new grid and leaves its input untouched, so the engine can run look-ahead
 * checks on disposable copies.
 *
 * Moves are computed for the canonical direction (left). The other three
 * directions are reduced to it by reversing and/or transposing the grid,
 * then the inverse transform is applied to the result.
 */

import { Cell, Direction, DIRECTIONS, Grid, Position, SlideResult } from './types';
import { EMPTY, cellEquals, numberCell } from './cells';

interface RowTile {
  cell: Cell;
  col: number;
}

/**
 * Mirror each row (left <-> right)
 */
export function reverseRows(grid: Grid): Grid {
  return grid.map((row) => row.slice().reverse());
}

/**
 * Swap rows and columns
 */
export function transpose(grid: Grid): Grid {
  return grid.map((row, r) => row.map((_, c) => grid[c][r]));
}

export function gridEquals(a: Grid, b: Grid): boolean {
  if (a.length !== b.length) return false;
  return a.every((row, r) => row.length === b[r].length && row.every((cell, c) => cellEquals(cell, b[r][c])));
}

/**
 * Zero the 3x3 neighbourhood around each centre. Returns the sum of the
 * numeric tiles that were removed.
 */
export function clearNeighbourhoods(grid: Grid, centres: Position[]): number {
  const size = grid.length;
  let bonus = 0;

  centres.forEach(({ row, col }) => {
    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        const r = row + dr;
        const c = col + dc;
        if (r < 0 || r >= size || c < 0 || c >= size) continue;
        const cell = grid[r][c];
        if (cell.kind === 'number') {
          bonus += cell.value;
        }
        grid[r][c] = EMPTY;
      }
    }
  });

  return bonus;
}

/**
 * Centres of the marker pairs a left slide of this row would bring together.
 * Pairing follows the merge scan, so a numeric merge consumes its tiles first.
 */
function markerPairCentres(row: Cell[], r: number): Position[] {
  const tiles: RowTile[] = [];
  row.forEach((cell, col) => {
    if (cell.kind !== 'empty') tiles.push({ cell, col });
  });

  const centres: Position[] = [];
  let i = 0;
  while (i < tiles.length) {
    const current = tiles[i].cell;
    const following = i + 1 < tiles.length ? tiles[i + 1].cell : undefined;

    if (current.kind === 'number' && following?.kind === 'number' && current.value === following.value) {
      i += 2;
    } else if (current.kind === 'marker' && following?.kind === 'marker') {
      centres.push({ row: r, col: tiles[i].col }, { row: r, col: tiles[i + 1].col });
      i += 2;
    } else {
      i += 1;
    }
  }
  return centres;
}

/**
 * Compact and merge one row. Markers never merge here.
 */
function mergeRow(row: Cell[], mergedValues: number[]): Cell[] {
  const tiles = row.filter((cell) => cell.kind !== 'empty');
  const merged: Cell[] = [];

  let i = 0;
  while (i < tiles.length) {
    const current = tiles[i];
    const following = tiles[i + 1];

    if (current.kind === 'number' && following?.kind === 'number' && current.value === following.value) {
      const value = current.value * 2;
      merged.push(numberCell(value));
      mergedValues.push(value);
      i += 2;
    } else {
      merged.push(current);
      i += 1;
    }
  }

  while (merged.length < row.length) {
    merged.push(EMPTY);
  }
  return merged;
}

/**
 * Slide every row to the left.
 *
 * Marker pairs are found on the input first. Their 3x3 neighbourhoods
 * (markers included) are cleared on a copy of the input, and only then is
 * the cleared copy compacted and merged.
 */
export function slideLeft(grid: Grid): SlideResult {
  const clearCentres = grid.flatMap((row, r) => markerPairCentres(row, r));
  const markerClears = clearCentres.length / 2;

  const cleared = grid.map((row) => row.slice());
  const clearedBonus = clearNeighbourhoods(cleared, clearCentres);

  const mergedValues: number[] = [];
  const next = cleared.map((row) => mergeRow(row, mergedValues));

  return {
    grid: next,
    moved: markerClears > 0 || !gridEquals(grid, next),
    mergedValues,
    markerClears,
    clearedBonus,
  };
}

/**
 * Slide the whole grid in any direction
 */
export function slideGrid(grid: Grid, direction: Direction): SlideResult {
  switch (direction) {
    case 'left':
      return slideLeft(grid);
    case 'right': {
      const result = slideLeft(reverseRows(grid));
      return { ...result, grid: reverseRows(result.grid) };
    }
    case 'up': {
      const result = slideLeft(transpose(grid));
      return { ...result, grid: transpose(result.grid) };
    }
    case 'down': {
      const result = slideLeft(reverseRows(transpose(grid)));
      return { ...result, grid: transpose(reverseRows(result.grid)) };
    }
  }
}

export function emptyPositions(grid: Grid): Position[] {
  const empties: Position[] = [];
  grid.forEach((row, r) => {
    row.forEach((cell, c) => {
      if (cell.kind === 'empty') empties.push({ row: r, col: c });
    });
  });
  return empties;
}

/**
 * Sum of every numeric tile. Markers count for nothing.
 */
export function sumTiles(grid: Grid): number {
  let total = 0;
  grid.forEach((row) => {
    row.forEach((cell) => {
      if (cell.kind === 'number') total += cell.value;
    });
  });
  return total;
}

/**
 * Largest numeric tile, or 0 when the grid holds none
 */
export function maxTile(grid: Grid): number {
  let max = 0;
  grid.forEach((row) => {
    row.forEach((cell) => {
      if (cell.kind === 'number' && cell.value > max) max = cell.value;
    });
  });
  return max;
}

/**
 * Terminal when the grid is full and no neighbours (right or below) are equal.
 * Two adjacent markers are equal cells, so they keep the game alive too.
 */
export function isTerminalGrid(grid: Grid): boolean {
  const size = grid.length;

  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      if (grid[r][c].kind === 'empty') return false;
    }
  }

  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      const current = grid[r][c];
      if (c + 1 < size && cellEquals(current, grid[r][c + 1])) return false;
      if (r + 1 < size && cellEquals(current, grid[r + 1][c])) return false;
    }
  }

  return true;
}

/**
 * Look-ahead: does any direction change the grid?
 */
export function canSlide(grid: Grid): boolean {
  return DIRECTIONS.some((direction) => slideGrid(grid, direction).moved);
}
