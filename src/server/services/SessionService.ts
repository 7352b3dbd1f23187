import { randomUUID } from 'crypto';
import { SessionRegistry } from '../../shared/core/SessionRegistry';
import { createSaveRecord, parseSaveRecord } from '../../shared/core/SaveRecord';
import { GameSnapshot, SaveRecord } from '../../shared/core/types';
import { createInvalidInputError } from '../../shared/errors';
import { Logger, createLogger } from '../../shared/logger';
import {
  MoveResponse,
  isMoveMessage,
  isNewGameMessage,
  isSubmitScoreRequest,
} from '../../shared/messages';
import { Leaderboard } from '../leaderboard/Leaderboard';
import { GridSizeLimits, resolveGridSize } from '../utils/gridSize';
import { sanitizeNickname } from '../utils/NicknameGenerator';

export interface CreatedSession {
  sessionId: string;
  state: GameSnapshot;
}

export interface SubmittedScore {
  stored: boolean;
  playerName: string;
}

/**
 * HTTP-facing operations on single-player sessions. Request bodies arrive
 * untyped and are checked here; failures surface as GameError.
 */
export class SessionService {
  private readonly logger: Logger;

  constructor(
    private readonly sessions: SessionRegistry,
    private readonly leaderboard: Leaderboard,
    private readonly limits: GridSizeLimits,
    private readonly generateId: () => string = randomUUID,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('SessionService');
  }

  async createSession(body: unknown): Promise<CreatedSession> {
    const size = this.requestedSize(body) ?? this.limits.defaultGridSize;
    const sessionId = this.generateId();
    const state = await this.sessions.getOrCreate(sessionId, size);
    this.logger.info('Session created', { sessionId, size });
    return { sessionId, state };
  }

  async getState(sessionId: string): Promise<GameSnapshot> {
    return this.sessions.getSnapshot(sessionId);
  }

  async move(sessionId: string, body: unknown): Promise<MoveResponse> {
    if (!isMoveMessage(body)) {
      throw createInvalidInputError('direction must be one of left, right, up, down', { body });
    }
    const { moved, snapshot } = await this.sessions.applyMove(sessionId, body.direction);
    return { moved, state: snapshot };
  }

  /**
   * Start over on the session, creating it if the id is new. Without a
   * size the session keeps its current one.
   */
  async newGame(sessionId: string, body: unknown): Promise<GameSnapshot> {
    const size = this.requestedSize(body);
    await this.sessions.getOrCreate(sessionId, size ?? this.limits.defaultGridSize);
    return this.sessions.reset(sessionId, { size });
  }

  async save(sessionId: string, now: Date = new Date()): Promise<SaveRecord> {
    const snapshot = await this.sessions.getSnapshot(sessionId);
    return createSaveRecord(snapshot, now);
  }

  async load(sessionId: string, body: unknown): Promise<GameSnapshot> {
    const record = parseSaveRecord(body);
    const { size } = record.game_state;
    if (size > this.limits.maxGridSize) {
      throw createInvalidInputError(`Saved grid size ${size} exceeds the maximum of ${this.limits.maxGridSize}`, {
        size,
        maxGridSize: this.limits.maxGridSize,
      });
    }
    return this.sessions.importState(sessionId, record.game_state);
  }

  end(sessionId: string): void {
    this.sessions.remove(sessionId);
    this.logger.info('Session ended', { sessionId });
  }

  async submitScore(body: unknown): Promise<SubmittedScore> {
    if (!isSubmitScoreRequest(body)) {
      throw createInvalidInputError('sessionId is required', { body });
    }
    const snapshot = await this.sessions.getSnapshot(body.sessionId);
    const playerName =
      body.nickname !== undefined
        ? sanitizeNickname(body.nickname)
        : `Player_${body.sessionId.slice(0, 8)}`;

    const stored = this.leaderboard.addOrUpdateScore({
      playerName,
      score: snapshot.score,
      maxTile: snapshot.max_tile,
      moves: snapshot.moves,
      size: snapshot.size,
    });
    return { stored, playerName };
  }

  private requestedSize(body: unknown): number | undefined {
    if (body === undefined || body === null) {
      return undefined;
    }
    if (!isNewGameMessage(body)) {
      throw createInvalidInputError('size must be a number', { body });
    }
    return body.size === undefined ? undefined : resolveGridSize(body.size, this.limits);
  }
}
