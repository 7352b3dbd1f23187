/**
 * GridEngine Tests
 *
 * Moves, spawning, scoring and lifecycle of a single grid. Random sources
 * are fixed so every spawn position and value is known.
 */

import { GridEngine } from './GridEngine';
import { isTerminalGrid, sumTiles } from './GridTransform';
import { fromWireGrid } from './cells';
import { DIRECTIONS, GameState, GridEngineCallbacks, WireCell, WireGrid } from './types';
import { GameError, GameErrorCode } from '../errors';

// Always 0: spawn on the first empty cell (row-major) with value 2
const first = () => 0;

// Always 0.95: spawn on the last empty cell with value 4
const lastHigh = () => 0.95;

function snapshotOf(grid: WireGrid, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { grid, size: grid.length, ...extra };
}

const CHECKERBOARD: WireGrid = [
  [2, 4, 2, 4],
  [4, 2, 4, 2],
  [2, 4, 2, 4],
  [4, 2, 4, 2],
];

describe('GridEngine', () => {
  describe('constructor', () => {
    it('should seed two tiles', () => {
      const engine = new GridEngine(4, { random: first });

      expect(engine.snapshot()).toEqual({
        grid: [
          [2, 2, 0, 0],
          [0, 0, 0, 0],
          [0, 0, 0, 0],
          [0, 0, 0, 0],
        ],
        score: 4,
        high_score: 4,
        moves: 0,
        game_over: false,
        won: false,
        size: 4,
        max_tile: 2,
      });
    });

    it('should clamp a random source that returns 1 to the last empty cell', () => {
      const engine = new GridEngine(2, { random: () => 1 });

      expect(engine.snapshot().grid).toEqual([
        [0, 0],
        [4, 4],
      ]);
    });

    it.each([1, 0, -3, 2.5, NaN])('should reject size %p', (size) => {
      expect(() => new GridEngine(size)).toThrow(
        expect.objectContaining({ code: GameErrorCode.INVALID_CONFIGURATION })
      );
    });

    it('should default to a 4x4 grid', () => {
      expect(new GridEngine().snapshot().size).toBe(4);
    });
  });

  describe('move', () => {
    it('should merge, count the move and spawn one tile', () => {
      const engine = new GridEngine(4, { random: first });

      const result = engine.move('left');

      expect(result).toEqual({ moved: true, markerCleared: false, clearedBonus: 0, mergedValues: [4] });
      const snapshot = engine.snapshot();
      expect(snapshot.grid[0]).toEqual([4, 2, 0, 0]);
      expect(snapshot.score).toBe(6);
      expect(snapshot.moves).toBe(1);
    });

    it('should leave the state untouched when nothing moves', () => {
      const engine = new GridEngine(4, { random: first });
      engine.move('left');
      const before = engine.snapshot();

      const result = engine.move('left');

      expect(result.moved).toBe(false);
      expect(engine.snapshot()).toEqual(before);
    });

    it('should clear around a marker pair and report the bonus', () => {
      const onMarkerClear = jest.fn();
      const engine = new GridEngine(4, { random: first, callbacks: { onMarkerClear } });
      engine.importState(snapshotOf([
        ['M', 'M', 4, 0],
        [2, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 8],
      ], { moves: 3 }));

      const result = engine.move('left');

      expect(result.markerCleared).toBe(true);
      expect(result.clearedBonus).toBe(6);
      expect(onMarkerClear).toHaveBeenCalledWith(6);

      const snapshot = engine.snapshot();
      expect(snapshot.grid).toEqual([
        [2, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [8, 0, 0, 0],
      ]);
      // Score is the tile sum; the cleared bonus is not added to it
      expect(snapshot.score).toBe(10);
      expect(snapshot.moves).toBe(4);
    });

    it('should set won once when 2048 is formed', () => {
      const onWin = jest.fn();
      const engine = new GridEngine(4, { random: first, callbacks: { onWin } });
      engine.importState(snapshotOf([
        [1024, 1024, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]));

      engine.move('left');
      expect(engine.snapshot().won).toBe(true);
      expect(onWin).toHaveBeenCalledTimes(1);

      engine.importState(snapshotOf([
        [1024, 1024, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]));
      engine.move('left');
      expect(onWin).toHaveBeenCalledTimes(1);
    });

    it('should detect game over after the spawn that fills the grid', () => {
      const onGameOver = jest.fn();
      const engine = new GridEngine(2, { random: lastHigh, callbacks: { onGameOver } });
      engine.importState(snapshotOf([
        [0, 2],
        [4, 8],
      ]));
      expect(engine.snapshot().game_over).toBe(false);

      engine.move('left');

      expect(engine.snapshot().grid).toEqual([
        [2, 4],
        [4, 8],
      ]);
      expect(engine.snapshot().game_over).toBe(true);
      expect(onGameOver).toHaveBeenCalledTimes(1);
      expect(engine.isTerminal()).toBe(true);
      expect(engine.canMove()).toBe(false);

      expect(engine.move('up').moved).toBe(false);
      expect(onGameOver).toHaveBeenCalledTimes(1);
    });

    it('should keep the state consistent over a long random game', () => {
      let seed = 42;
      const random = () => {
        seed = (seed * 16807) % 2147483647;
        return seed / 2147483647;
      };
      const engine = new GridEngine(4, { random });

      for (let i = 0; i < 300 && !engine.getState().gameOver; i++) {
        engine.move(DIRECTIONS[Math.floor(random() * DIRECTIONS.length)]);

        const snapshot = engine.snapshot();
        const grid = fromWireGrid(snapshot.grid, 4);
        expect(snapshot.score).toBe(sumTiles(grid));
        expect(snapshot.high_score).toBeGreaterThanOrEqual(snapshot.score);
        expect(snapshot.game_over).toBe(isTerminalGrid(grid));
      }
    });

    it('should keep the state consistent on random grids with markers', () => {
      let seed = 2024;
      const random = () => {
        seed = (seed * 16807) % 2147483647;
        return seed / 2147483647;
      };
      const values: WireCell[] = [0, 0, 2, 2, 4, 8, 'M'];

      for (let i = 0; i < 30; i++) {
        const rows: WireGrid = Array.from({ length: 4 }, () =>
          Array.from({ length: 4 }, () => values[Math.floor(random() * values.length)])
        );

        DIRECTIONS.forEach((direction) => {
          const engine = new GridEngine(4, { random });
          engine.importState(snapshotOf(rows, { moves: 5 }));
          const before = engine.snapshot();

          const result = engine.move(direction);

          const after = engine.snapshot();
          const grid = fromWireGrid(after.grid, 4);
          expect(after.score).toBe(sumTiles(grid));
          expect(after.game_over).toBe(isTerminalGrid(grid));
          if (result.moved) {
            expect(after.moves).toBe(6);
          } else {
            expect(after.grid).toEqual(before.grid);
            expect(after.moves).toBe(5);
          }
        });
      }
    });
  });

  describe('spawnTile', () => {
    it('should return false on a full grid', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf(CHECKERBOARD));

      expect(engine.spawnTile()).toBe(false);
      expect(engine.isTerminal()).toBe(true);
      expect(engine.snapshot().game_over).toBe(true);
    });

    it('should place a 4 when the value draw is at or above 0.9', () => {
      const engine = new GridEngine(2, { random: first });

      expect(engine.spawnTile()).toBe(true);
      expect(engine.snapshot().grid).toEqual([
        [2, 2],
        [2, 0],
      ]);

      const high = new GridEngine(2, { random: () => 0.9 });
      // index floor(0.9 * 4) = 3, then floor(0.9 * 3) = 2
      expect(high.snapshot().grid).toEqual([
        [0, 0],
        [4, 4],
      ]);
    });
  });

  describe('reset', () => {
    it('should keep the high score by default', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf(CHECKERBOARD, { high_score: 500, moves: 40 }));

      engine.reset();

      const snapshot = engine.snapshot();
      expect(snapshot.high_score).toBe(500);
      expect(snapshot.score).toBe(4);
      expect(snapshot.moves).toBe(0);
      expect(snapshot.game_over).toBe(false);
      expect(snapshot.won).toBe(false);
    });

    it('should drop the high score when asked', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf(CHECKERBOARD, { high_score: 500 }));

      engine.reset({ preserveHighScore: false });

      expect(engine.snapshot().high_score).toBe(4);
    });

    it('should change size', () => {
      const engine = new GridEngine(4, { random: first });

      engine.reset({ size: 6 });

      expect(engine.snapshot().size).toBe(6);
      expect(engine.snapshot().grid).toHaveLength(6);
      expect(engine.snapshot().grid[0][0]).toBe(2);
    });

    it('should reject an invalid size and keep the current grid', () => {
      const engine = new GridEngine(4, { random: first });
      const before = engine.snapshot();

      expect(() => engine.reset({ size: 1 })).toThrow(GameError);
      expect(engine.snapshot()).toEqual(before);
    });
  });

  describe('importState', () => {
    it('should take the higher high score and recompute score', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf(CHECKERBOARD, { high_score: 100, score: 9999, moves: 7 }));

      expect(engine.snapshot().high_score).toBe(100);
      expect(engine.snapshot().score).toBe(48);
      expect(engine.snapshot().moves).toBe(7);

      engine.importState(snapshotOf(CHECKERBOARD, { high_score: 50 }));
      expect(engine.snapshot().high_score).toBe(100);
    });

    it('should never clear won', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf(CHECKERBOARD, { won: true }));
      engine.importState(snapshotOf(CHECKERBOARD, { won: false }));

      expect(engine.snapshot().won).toBe(true);
    });

    it('should adopt the size of the imported grid', () => {
      const engine = new GridEngine(4, { random: first });
      engine.importState(snapshotOf([
        [2, 0, 0],
        [0, 'M', 0],
        [0, 0, 0],
      ]));

      expect(engine.snapshot().size).toBe(3);
      expect(engine.snapshot().grid[1][1]).toBe('M');
    });

    it.each([
      ['non-power-of-two cell', snapshotOf([[3, 0], [0, 0]])],
      ['short row', { grid: [[2, 0], [0]], size: 2 }],
      ['size mismatch', { grid: [[2, 0], [0, 0]], size: 3 }],
      ['unknown marker', { grid: [['X', 0], [0, 0]], size: 2 }],
      ['not an object', 'grid'],
    ])('should reject a %s with STATE_CORRUPTION', (_label, raw) => {
      const engine = new GridEngine(4, { random: first });
      const before = engine.snapshot();

      expect(() => engine.importState(raw)).toThrow(
        expect.objectContaining({ code: GameErrorCode.STATE_CORRUPTION })
      );
      expect(engine.snapshot()).toEqual(before);
    });
  });

  describe('fromSnapshot', () => {
    it('should restore without seeding new tiles', () => {
      const engine = GridEngine.fromSnapshot(
        snapshotOf([
          [8, 0],
          [0, 0],
        ], { high_score: 64, moves: 12, won: true }),
        { random: first }
      );

      expect(engine.snapshot()).toEqual({
        grid: [
          [8, 0],
          [0, 0],
        ],
        score: 8,
        high_score: 64,
        moves: 12,
        game_over: false,
        won: true,
        size: 2,
        max_tile: 8,
      });
    });
  });

  describe('snapshot', () => {
    it('should be a deep copy', () => {
      const engine = new GridEngine(4, { random: first });
      const snapshot = engine.snapshot();

      snapshot.grid[0][0] = 1024;

      expect(engine.snapshot().grid[0][0]).toBe(2);
    });
  });

  describe('shouldAutoSave', () => {
    it.each([
      [1024, false],
      [2048, true],
      [4096, true],
    ])('max tile %p -> %p', (tile, expected) => {
      const engine = new GridEngine(2, { random: first });
      engine.importState(snapshotOf([
        [tile, 0],
        [0, 0],
      ]));

      expect(engine.shouldAutoSave()).toBe(expected);
    });
  });

  describe('callbacks', () => {
    it('should pass the live state to onWin', () => {
      const states: GameState[] = [];
      const callbacks: GridEngineCallbacks = { onWin: (state) => states.push(state) };
      const engine = new GridEngine(2, { random: first, callbacks });
      engine.importState(snapshotOf([
        [1024, 1024],
        [0, 0],
      ]));

      engine.move('right');

      expect(states).toHaveLength(1);
      expect(states[0].won).toBe(true);
    });
  });
});
