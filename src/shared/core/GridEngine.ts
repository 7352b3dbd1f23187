/**
 * GridEngine - single grid state machine
 *
 * Owns one GameState and applies directional moves, tile spawns and
 * terminal detection to it. It has no I/O and no notion of concurrency;
 * callers that share an engine between requests (SessionRegistry) are
 * responsible for serialising access.
 *
 * This class is platform-independent and can be used by:
 * - Server (SessionRegistry) for HTTP sessions and colyseus rooms
 * - Client (LocalGameAdapter) for the desktop shell
 *
 * Usage:
 * 1. Create with a grid size (two tiles are spawned immediately)
 * 2. Call move() for each directional input
 * 3. Read snapshot() to render or send the state outward
 * 4. Call reset() or importState() to start over or restore a save
 */

import {
  GameSnapshot,
  GameState,
  Direction,
  GridEngineCallbacks,
  GridEngineOptions,
  MoveResult,
  RandomSource,
  ResetOptions,
} from './types';
import { assertGridShape, createEmptyGrid, fromWireGrid, numberCell, parseSnapshot, toWireGrid } from './cells';
import { canSlide, emptyPositions, isTerminalGrid, maxTile, slideGrid, sumTiles } from './GridTransform';
import {
  DEFAULT_GRID_SIZE,
  INITIAL_TILE_COUNT,
  MIN_GRID_SIZE,
  SPAWN_HIGH_PROBABILITY,
  SPAWN_HIGH_VALUE,
  SPAWN_LOW_VALUE,
  WIN_TILE,
} from '../constants';
import { createInvalidConfigurationError } from '../errors';

/**
 * Throw INVALID_CONFIGURATION unless size is an integer >= MIN_GRID_SIZE
 */
export function assertValidSize(size: number): void {
  if (!Number.isInteger(size) || size < MIN_GRID_SIZE) {
    throw createInvalidConfigurationError(size, MIN_GRID_SIZE);
  }
}

export class GridEngine {
  private state: GameState;
  private readonly random: RandomSource;
  private readonly callbacks: GridEngineCallbacks;

  /**
   * Create a new engine with a freshly seeded grid
   *
   * @param size - Side length of the square grid
   * @param options - Random source (default Math.random) and event callbacks
   */
  constructor(size: number = DEFAULT_GRID_SIZE, options: GridEngineOptions = {}) {
    assertValidSize(size);
    this.random = options.random ?? Math.random;
    this.callbacks = options.callbacks ?? {};
    this.state = this.createInitialState(size, 0);
  }

  /**
   * Build an engine around a saved snapshot without seeding new tiles
   */
  static fromSnapshot(raw: unknown, options: GridEngineOptions = {}): GridEngine {
    const snapshot = parseSnapshot(raw);
    const engine = new GridEngine(snapshot.size, options);
    engine.state = {
      grid: fromWireGrid(snapshot.grid, snapshot.size),
      size: snapshot.size,
      score: 0,
      highScore: snapshot.high_score,
      moves: snapshot.moves,
      gameOver: false,
      won: snapshot.won,
    };
    engine.refresh(false);
    return engine;
  }

  /**
   * Live state. Callers outside the engine should prefer snapshot().
   */
  getState(): Readonly<GameState> {
    return this.state;
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  /**
   * Slide the grid. When anything changed, the move counter advances, one
   * tile is spawned, and score, high score and game over are re-derived.
   * A move that changes nothing leaves the state untouched.
   */
  move(direction: Direction): MoveResult {
    assertGridShape(this.state.grid, this.state.size);

    const result = slideGrid(this.state.grid, direction);
    if (!result.moved) {
      return { moved: false, markerCleared: false, clearedBonus: 0, mergedValues: [] };
    }

    this.state.grid = result.grid;
    this.state.moves += 1;

    if (!this.state.won && result.mergedValues.includes(WIN_TILE)) {
      this.state.won = true;
      this.callbacks.onWin?.(this.state);
    }

    if (result.markerClears > 0) {
      this.callbacks.onMarkerClear?.(result.clearedBonus);
    }

    this.spawnTile();

    return {
      moved: true,
      markerCleared: result.markerClears > 0,
      clearedBonus: result.clearedBonus,
      mergedValues: result.mergedValues,
    };
  }

  /**
   * Place a 2 (90%) or 4 (10%) on a uniformly chosen empty cell.
   *
   * @returns false when the grid has no empty cell
   */
  spawnTile(): boolean {
    assertGridShape(this.state.grid, this.state.size);

    const spawned = this.placeRandomTile();
    this.refresh(true);
    return spawned;
  }

  isTerminal(): boolean {
    return isTerminalGrid(this.state.grid);
  }

  /**
   * Whether any direction would change the grid (tried on copies)
   */
  canMove(): boolean {
    return canSlide(this.state.grid);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start a new grid, optionally at a different size
   */
  reset(options: ResetOptions = {}): void {
    const size = options.size ?? this.state.size;
    assertValidSize(size);
    const preserveHighScore = options.preserveHighScore ?? true;
    this.state = this.createInitialState(size, preserveHighScore ? this.state.highScore : 0);
  }

  /**
   * Replace the grid with an imported snapshot. The high score and won flag
   * never go backwards; score and game over are derived from the grid.
   */
  importState(raw: unknown): void {
    const snapshot = parseSnapshot(raw);
    this.state = {
      grid: fromWireGrid(snapshot.grid, snapshot.size),
      size: snapshot.size,
      score: 0,
      highScore: Math.max(this.state.highScore, snapshot.high_score),
      moves: snapshot.moves,
      gameOver: false,
      won: this.state.won || snapshot.won,
    };
    this.refresh(false);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Deep copy of the state in wire form
   */
  snapshot(): GameSnapshot {
    return {
      grid: toWireGrid(this.state.grid),
      score: this.state.score,
      high_score: this.state.highScore,
      moves: this.state.moves,
      game_over: this.state.gameOver,
      won: this.state.won,
      size: this.state.size,
      max_tile: this.getMaxTile(),
    };
  }

  getMaxTile(): number {
    return maxTile(this.state.grid);
  }

  /**
   * True when the largest tile is a positive multiple of the winning tile
   */
  shouldAutoSave(): boolean {
    const max = this.getMaxTile();
    return max >= WIN_TILE && max % WIN_TILE === 0;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private createInitialState(size: number, highScore: number): GameState {
    this.state = {
      grid: createEmptyGrid(size),
      size,
      score: 0,
      highScore,
      moves: 0,
      gameOver: false,
      won: false,
    };
    for (let i = 0; i < INITIAL_TILE_COUNT; i++) {
      this.placeRandomTile();
    }
    this.refresh(false);
    return this.state;
  }

  private placeRandomTile(): boolean {
    const empties = emptyPositions(this.state.grid);
    if (empties.length === 0) return false;

    const index = Math.min(empties.length - 1, Math.floor(this.random() * empties.length));
    const { row, col } = empties[index];
    const value = this.random() < 1 - SPAWN_HIGH_PROBABILITY ? SPAWN_LOW_VALUE : SPAWN_HIGH_VALUE;
    this.state.grid[row][col] = numberCell(value);
    return true;
  }

  /**
   * Re-derive score, high score and game over from the grid
   */
  private refresh(notify: boolean): void {
    this.state.score = sumTiles(this.state.grid);
    if (this.state.score > this.state.highScore) {
      this.state.highScore = this.state.score;
    }

    const wasOver = this.state.gameOver;
    this.state.gameOver = isTerminalGrid(this.state.grid);
    if (notify && this.state.gameOver && !wasOver) {
      this.callbacks.onGameOver?.(this.state);
    }
  }
}
