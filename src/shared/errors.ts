export enum GameErrorCode {
  // Configuration errors
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',

  // Registry errors
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',

  // Game state errors
  STATE_CORRUPTION = 'STATE_CORRUPTION',

  // Network errors
  RATE_LIMITED = 'RATE_LIMITED',

  // Validation errors
  INVALID_INPUT = 'INVALID_INPUT',
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // Internal errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class GameError extends Error {
  public readonly code: GameErrorCode;
  public readonly statusCode: number;
  public readonly metadata?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: GameErrorCode,
    statusCode: number = 400,
    metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.statusCode = statusCode;
    this.metadata = metadata;
    this.timestamp = Date.now();
    Object.setPrototypeOf(this, GameError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      metadata: this.metadata,
      timestamp: this.timestamp,
    };
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

// Factory functions for common errors
export function createInvalidConfigurationError(size: unknown, minSize: number): GameError {
  return new GameError(
    `Grid size must be an integer >= ${minSize}`,
    GameErrorCode.INVALID_CONFIGURATION,
    400,
    { size, minSize }
  );
}

export function createKeyNotFoundError(key: string): GameError {
  return new GameError(`No game registered for key: ${key}`, GameErrorCode.KEY_NOT_FOUND, 404, { key });
}

export function createStateCorruptionError(reason: string, metadata?: Record<string, unknown>): GameError {
  return new GameError(`Corrupt game state: ${reason}`, GameErrorCode.STATE_CORRUPTION, 422, metadata);
}

export function createInvalidInputError(message: string, metadata?: Record<string, unknown>): GameError {
  return new GameError(message, GameErrorCode.INVALID_INPUT, 400, metadata);
}

export function createValidationFailedError(message: string, metadata?: Record<string, unknown>): GameError {
  return new GameError(message, GameErrorCode.VALIDATION_FAILED, 400, metadata);
}

export function createInternalError(message: string = 'Internal server error'): GameError {
  return new GameError(message, GameErrorCode.INTERNAL_ERROR, 500);
}
