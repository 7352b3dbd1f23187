/**
 * Platform-independent game types for the tile-merge puzzle
 *
 * These types are shared between server (express + colyseus) and client adapters.
 * They contain NO dependencies on Colyseus schemas or any platform-specific code.
 */

// =============================================================================
// Cell Types
// =============================================================================

export interface EmptyCell {
  readonly kind: 'empty';
}

export interface NumberCell {
  readonly kind: 'number';
  /** Power of two, at least 2 */
  readonly value: number;
}

/**
 * Special "M" tile. Merges only with another marker and clears the
 * 3x3 neighbourhood of both when it does.
 */
export interface MarkerCell {
  readonly kind: 'marker';
}

export type Cell = EmptyCell | NumberCell | MarkerCell;

/**
 * Square matrix of cells, indexed grid[row][col]
 */
export type Grid = Cell[][];

/**
 * Cell as it travels over the wire or into a save record:
 * 0 = empty, "M" = marker, otherwise the tile value
 */
export type WireCell = number | 'M';

export type WireGrid = WireCell[][];

// =============================================================================
// Movement Types
// =============================================================================

export type Direction = 'left' | 'right' | 'up' | 'down';

export const DIRECTIONS: readonly Direction[] = ['left', 'right', 'up', 'down'];

export interface Position {
  row: number;
  col: number;
}

/**
 * Output of sliding a grid in one direction (no spawn, no rescoring)
 */
export interface SlideResult {
  grid: Grid;

  /** True if any cell differs from the input or a marker pair was cleared */
  moved: boolean;

  /** Values produced by numeric merges, in scan order */
  mergedValues: number[];

  /** Number of marker pairs that merged */
  markerClears: number;

  /** Sum of numeric tiles removed by marker clears */
  clearedBonus: number;
}

export interface MoveResult {
  moved: boolean;
  markerCleared: boolean;
  clearedBonus: number;
  mergedValues: number[];
}

// =============================================================================
// Game State Types
// =============================================================================

/**
 * Complete state of one grid
 */
export interface GameState {
  grid: Grid;

  /** Sum of every numeric tile currently on the grid */
  score: number;

  /** Highest score ever observed by this instance */
  highScore: number;

  /** Moves that changed the grid */
  moves: number;

  gameOver: boolean;

  /** Set once a merge produced the winning tile */
  won: boolean;

  size: number;
}

/**
 * Immutable outward copy of a GameState, in wire field names
 */
export interface GameSnapshot {
  grid: WireGrid;
  score: number;
  high_score: number;
  moves: number;
  game_over: boolean;
  won: boolean;
  size: number;
  max_tile: number;
}

/**
 * Persistence record exchanged with the save collaborator
 */
export interface SaveRecord {
  /** ISO-8601 timestamp */
  timestamp: string;

  /** Human-readable "YYYY-MM-DD HH:mm:ss" */
  date: string;

  game_state: GameSnapshot;

  version: string;
}

// =============================================================================
// Callback Types
// =============================================================================

/**
 * Callbacks for grid engine events
 */
export interface GridEngineCallbacks {
  /** Called once, when a merge first produces the winning tile */
  onWin?: (state: GameState) => void;

  /** Called when a marker pair merges, with the banked tile values */
  onMarkerClear?: (bonus: number) => void;

  /** Called when a spawn leaves the grid terminal */
  onGameOver?: (state: GameState) => void;
}

/**
 * Source of uniform numbers in [0, 1)
 */
export type RandomSource = () => number;

export interface GridEngineOptions {
  random?: RandomSource;
  callbacks?: GridEngineCallbacks;
}

export interface ResetOptions {
  size?: number;

  /** Keep the accumulated high score (default true) */
  preserveHighScore?: boolean;
}
