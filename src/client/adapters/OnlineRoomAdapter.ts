/**
 * Online Room Adapter
 *
 * Wraps a colyseus room of type grid_room to implement GameAdapter.
 * Everyone in the room plays the same grid.
 */

import { Client } from 'colyseus.js';
import { GameAdapter, ErrorCallback, StateChangeCallback } from './GameAdapter';
import { Direction, GameSnapshot, parseSnapshot } from '../../shared/core';
import { isGameError } from '../../shared/errors';
import { createLogger } from '../../shared/logger';
import { ErrorMessage, RoomOptions, isErrorMessage, isRoomJoinedMessage } from '../../shared/messages';

const logger = createLogger('OnlineRoomAdapter');

/**
 * The parts of a colyseus.js Room the adapter uses
 */
export interface RoomConnection {
  readonly sessionId: string;
  send(type: string, message?: unknown): void;
  onMessage(type: string, callback: (message: unknown) => void): unknown;
  onLeave(callback: (code: number) => void): unknown;
  leave(consented?: boolean): Promise<number>;
}

export class OnlineRoomAdapter implements GameAdapter {
  private _state: GameSnapshot | null = null;
  private _roomKey = '';
  private stateChangeCallbacks: StateChangeCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];
  private leaveCallbacks: ((code: number) => void)[] = [];

  constructor(private readonly room: RoomConnection) {
    this.room.onMessage('roomJoined', (message) => {
      if (isRoomJoinedMessage(message)) {
        this._roomKey = message.roomKey;
      }
    });

    this.room.onMessage('gameState', (message) => {
      try {
        this._state = parseSnapshot(message);
      } catch (error) {
        if (!isGameError(error)) throw error;
        logger.warn('Dropping malformed gameState', error.toJSON());
        return;
      }
      const state = this._state;
      this.stateChangeCallbacks.forEach((cb) => cb(state));
    });

    this.room.onMessage('error', (message) => {
      const error: ErrorMessage = isErrorMessage(message) ? message : { message: 'Unknown room error' };
      this.errorCallbacks.forEach((cb) => cb(error));
    });

    this.room.onLeave((code) => {
      this.leaveCallbacks.forEach((cb) => cb(code));
    });
  }

  /**
   * Join (or create) the room for a key on the given server
   */
  static async connect(wsUrl: string, options: RoomOptions = {}): Promise<OnlineRoomAdapter> {
    const client = new Client(wsUrl);
    const room = await client.joinOrCreate('grid_room', options);
    return new OnlineRoomAdapter(room);
  }

  get state(): GameSnapshot | null {
    return this._state;
  }

  get roomKey(): string {
    return this._roomKey;
  }

  get sessionId(): string {
    return this.room.sessionId;
  }

  get isOffline(): boolean {
    return false;
  }

  async move(direction: Direction): Promise<void> {
    this.room.send('move', { direction });
  }

  async newGame(size?: number): Promise<void> {
    this.room.send('newGame', size === undefined ? {} : { size });
  }

  onStateChange(callback: StateChangeCallback): void {
    this.stateChangeCallbacks.push(callback);
  }

  onError(callback: ErrorCallback): void {
    this.errorCallbacks.push(callback);
  }

  onLeave(callback: (code: number) => void): void {
    this.leaveCallbacks.push(callback);
  }

  async leave(): Promise<void> {
    await this.room.leave();
  }

  destroy(): void {
    this.stateChangeCallbacks = [];
    this.errorCallbacks = [];
    this.leaveCallbacks = [];
  }
}
