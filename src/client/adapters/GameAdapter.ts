/**
 * Game Adapter Interface
 *
 * Common interface for the local (in-process) and online (colyseus room)
 * ways of playing a grid, so a front end can drive either identically.
 */

import { Direction, GameSnapshot } from '../../shared/core/types';
import { ErrorMessage } from '../../shared/messages';

export type StateChangeCallback = (state: GameSnapshot) => void;
export type ErrorCallback = (error: ErrorMessage) => void;

export interface GameAdapter {
  /** Latest known state, null until the first one arrives */
  readonly state: GameSnapshot | null;

  /** Whether this adapter runs without a server */
  readonly isOffline: boolean;

  /** Slide the grid */
  move(direction: Direction): Promise<void>;

  /** Start over, optionally at another size */
  newGame(size?: number): Promise<void>;

  /** Register callback for state changes */
  onStateChange(callback: StateChangeCallback): void;

  /** Register callback for rejected operations */
  onError(callback: ErrorCallback): void;

  /** Release the game and all callbacks */
  destroy(): void;
}
