import { Room, Client } from 'colyseus';
import { GridRoomState, applySnapshot } from '../schema/GridRoomState';
import { PlayerSchema } from '../schema/PlayerSchema';
import { SessionRegistry } from '../../shared/core/SessionRegistry';
import { GameSnapshot } from '../../shared/core/types';
import { GameErrorCode, createInvalidInputError, isGameError } from '../../shared/errors';
import { createLogger } from '../../shared/logger';
import {
  ErrorMessage,
  RoomJoinedMessage,
  RoomOptions,
  isMoveMessage,
  isNewGameMessage,
  isRoomOptions,
} from '../../shared/messages';
import { GridSizeLimits, resolveGridSize } from '../utils/gridSize';
import { sanitizeNickname } from '../utils/NicknameGenerator';

const logger = createLogger('GridRoom');

// Open rooms per registry key; an entry outlives every room but the last
const roomCounts = new WeakMap<SessionRegistry, Map<string, number>>();

function countsFor(registry: SessionRegistry): Map<string, number> {
  let counts = roomCounts.get(registry);
  if (!counts) {
    counts = new Map();
    roomCounts.set(registry, counts);
  }
  return counts;
}

function retainKey(registry: SessionRegistry, key: string): void {
  const counts = countsFor(registry);
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * @returns true when no other room still plays on the key
 */
function releaseKey(registry: SessionRegistry, key: string): boolean {
  const counts = countsFor(registry);
  const remaining = (counts.get(key) ?? 1) - 1;
  if (remaining > 0) {
    counts.set(key, remaining);
    return false;
  }
  counts.delete(key);
  return true;
}

/**
 * Shared grid room. Everyone in the room plays the same grid; the grid
 * itself lives in the rooms registry under the room key, and every change
 * is mirrored into the schema state and broadcast as a gameState message.
 */
export class GridRoom extends Room<GridRoomState> {
  private roomKey = '';
  private retained = false;
  private unsubscribe?: () => void;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly limits: GridSizeLimits
  ) {
    super();
  }

  async onCreate(rawOptions: unknown) {
    const options: RoomOptions = isRoomOptions(rawOptions) ? rawOptions : {};
    this.roomKey = options.roomKey || this.roomId;

    this.setState(new GridRoomState());
    this.state.roomKey = this.roomKey;
    await this.setMetadata({ roomKey: this.roomKey });

    const size = resolveGridSize(options.size, this.limits);
    const snapshot = await this.registry.getOrCreate(this.roomKey, size);
    retainKey(this.registry, this.roomKey);
    this.retained = true;
    applySnapshot(this.state, snapshot);

    this.unsubscribe = this.registry.subscribe(this.roomKey, (next) => {
      this.publish(next);
    });

    this.onMessage('move', (client, message: unknown) => {
      this.handleMove(client, message).catch((error: unknown) => logger.error('Move handler failed', error));
    });

    this.onMessage('newGame', (client, message: unknown) => {
      this.handleNewGame(client, message).catch((error: unknown) => logger.error('newGame handler failed', error));
    });

    logger.info(`Room created: ${this.roomKey}`, { size });
  }

  /**
   * Rejected moves are answered with an error message to the sender only;
   * accepted ones reach everybody through the registry subscription.
   */
  async handleMove(client: Client, message: unknown): Promise<void> {
    try {
      if (!isMoveMessage(message)) {
        throw createInvalidInputError('direction must be one of left, right, up, down', { message });
      }
      const { moved } = await this.registry.applyMove(this.roomKey, message.direction);
      if (!moved) {
        logger.debug('Move changed nothing', { roomKey: this.roomKey, client: client.sessionId });
      }
    } catch (error) {
      this.sendError(client, error);
    }
  }

  async handleNewGame(client: Client, message: unknown): Promise<void> {
    try {
      const body = message ?? {};
      if (!isNewGameMessage(body)) {
        throw createInvalidInputError('size must be a number', { message });
      }
      const size = body.size === undefined ? undefined : resolveGridSize(body.size, this.limits);
      await this.registry.reset(this.roomKey, { size });
    } catch (error) {
      this.sendError(client, error);
    }
  }

  async onJoin(client: Client, rawOptions: unknown) {
    const options: RoomOptions = isRoomOptions(rawOptions) ? rawOptions : {};

    const player = new PlayerSchema();
    player.sessionId = client.sessionId;
    player.nickname = sanitizeNickname(options.nickname);
    player.joinedAt = Date.now();
    this.state.players.set(client.sessionId, player);

    const joined: RoomJoinedMessage = { roomKey: this.roomKey, playersCount: this.state.players.size };
    client.send('roomJoined', joined);
    client.send('gameState', await this.registry.getSnapshot(this.roomKey));
  }

  onLeave(client: Client) {
    this.state.players.delete(client.sessionId);
  }

  onDispose() {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.retained) {
      this.retained = false;
      if (releaseKey(this.registry, this.roomKey)) {
        this.registry.remove(this.roomKey);
      }
    }
    logger.info(`Room disposed: ${this.roomKey}`);
  }

  private publish(snapshot: GameSnapshot): void {
    applySnapshot(this.state, snapshot);
    this.broadcast('gameState', snapshot);
  }

  private sendError(client: Client, error: unknown): void {
    if (isGameError(error)) {
      const message: ErrorMessage = { message: error.message, code: error.code, metadata: error.metadata };
      client.send('error', message);
      return;
    }
    logger.error('Unexpected room error', error);
    client.send('error', { message: 'Internal server error', code: GameErrorCode.INTERNAL_ERROR });
  }
}

/**
 * Room class bound to a registry, for gameServer.define()
 */
export function bindGridRoom(registry: SessionRegistry, limits: GridSizeLimits): new () => GridRoom {
  return class BoundGridRoom extends GridRoom {
    constructor() {
      super(registry, limits);
    }
  };
}
