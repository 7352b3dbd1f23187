/**
 * Shared constants for the tile-merge game
 * Used by both server and client
 */

// Grid
export const DEFAULT_GRID_SIZE = 4;
export const MIN_GRID_SIZE = 2;
export const MAX_GRID_SIZE = 8; // transport cap, the engine accepts any size >= MIN_GRID_SIZE

// Tiles
export const WIN_TILE = 2048;
export const SPAWN_LOW_VALUE = 2;
export const SPAWN_HIGH_VALUE = 4;
export const SPAWN_HIGH_PROBABILITY = 0.1;
export const INITIAL_TILE_COUNT = 2;

// Wire encoding
export const WIRE_EMPTY = 0;
export const WIRE_MARKER = 'M';
export const SCHEMA_MARKER_CODE = -1; // marker cell inside numeric colyseus arrays

// Persistence
export const SAVE_VERSION = '2.1.0';

// Leaderboard
export const LEADERBOARD_LIMIT = 10;

// Metrics
export const METRICS_SAMPLE_LIMIT = 1000;
