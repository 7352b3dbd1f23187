import { DIRECTIONS, Direction, GameSnapshot } from './core/types';

// Client -> Server messages
export interface MoveMessage {
  direction: Direction;
}

export interface NewGameMessage {
  size?: number;
}

export interface SubmitScoreRequest {
  sessionId: string;
  nickname?: string;
}

// Server -> Client messages
export interface RoomJoinedMessage {
  roomKey: string;
  playersCount: number;
}

export interface MoveResponse {
  moved: boolean;
  state: GameSnapshot;
}

export interface ErrorMessage {
  message: string;
  code?: string;
  metadata?: Record<string, unknown>;
}

// Room options
export interface RoomOptions {
  roomKey?: string;
  size?: number;
  nickname?: string;
}

// Type guards
function isObject(msg: unknown): msg is Record<string, unknown> {
  return typeof msg === 'object' && msg !== null && !Array.isArray(msg);
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.some((direction) => direction === value);
}

export function isMoveMessage(msg: unknown): msg is MoveMessage {
  return isObject(msg) && isDirection(msg.direction);
}

export function isNewGameMessage(msg: unknown): msg is NewGameMessage {
  return isObject(msg) && (msg.size === undefined || typeof msg.size === 'number');
}

export function isSubmitScoreRequest(msg: unknown): msg is SubmitScoreRequest {
  return (
    isObject(msg) &&
    typeof msg.sessionId === 'string' &&
    (msg.nickname === undefined || typeof msg.nickname === 'string')
  );
}

export function isRoomOptions(msg: unknown): msg is RoomOptions {
  return (
    isObject(msg) &&
    (msg.roomKey === undefined || typeof msg.roomKey === 'string') &&
    (msg.size === undefined || typeof msg.size === 'number') &&
    (msg.nickname === undefined || typeof msg.nickname === 'string')
  );
}

export function isRoomJoinedMessage(msg: unknown): msg is RoomJoinedMessage {
  return isObject(msg) && typeof msg.roomKey === 'string' && typeof msg.playersCount === 'number';
}

export function isErrorMessage(msg: unknown): msg is ErrorMessage {
  return (
    isObject(msg) &&
    typeof msg.message === 'string' &&
    (msg.code === undefined || typeof msg.code === 'string') &&
    (msg.metadata === undefined || isObject(msg.metadata))
  );
}
