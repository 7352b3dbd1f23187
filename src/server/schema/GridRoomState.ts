import { Schema, type, ArraySchema, MapSchema } from '@colyseus/schema';
import { PlayerSchema } from './PlayerSchema';
import { SCHEMA_MARKER_CODE, WIRE_MARKER } from '../../shared/constants';
import { GameSnapshot } from '../../shared/core/types';

/**
 * Synchronised view of the room's grid. The grid is flattened row-major;
 * markers are encoded as -1 since schema arrays hold one primitive type.
 */
export class GridRoomState extends Schema {
  @type('string') roomKey: string = '';
  @type(['number']) cells = new ArraySchema<number>();
  @type('number') size: number = 0;
  @type('number') score: number = 0;
  @type('number') highScore: number = 0;
  @type('number') moves: number = 0;
  @type('number') maxTile: number = 0;
  @type('boolean') gameOver: boolean = false;
  @type('boolean') won: boolean = false;
  @type({ map: PlayerSchema }) players = new MapSchema<PlayerSchema>();
}

export function applySnapshot(state: GridRoomState, snapshot: GameSnapshot): void {
  const flat = snapshot.grid.flat().map((cell) => (cell === WIRE_MARKER ? SCHEMA_MARKER_CODE : cell));

  // Reuse indices so only changed cells are patched
  flat.forEach((value, index) => {
    if (index >= state.cells.length) {
      state.cells.push(value);
    } else if (state.cells[index] !== value) {
      state.cells[index] = value;
    }
  });
  while (state.cells.length > flat.length) {
    state.cells.pop();
  }

  state.size = snapshot.size;
  state.score = snapshot.score;
  state.highScore = snapshot.high_score;
  state.moves = snapshot.moves;
  state.maxTile = snapshot.max_tile;
  state.gameOver = snapshot.game_over;
  state.won = snapshot.won;
}
