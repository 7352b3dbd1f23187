/**
 * Shared Game Core Module
 *
 * Platform-independent game logic that can be used by both
 * server (sessions and rooms) and client (local shell).
 */

// Types
export * from './types';

// Cells and pure grid functions
export * from './cells';
export * from './GridTransform';

// Persistence records
export { createSaveRecord, parseSaveRecord, formatSaveDate } from './SaveRecord';

// Main Engine
export { GridEngine, assertValidSize } from './GridEngine';

// Key -> engine registry
export {
  SessionRegistry,
  type SessionRegistryOptions,
  type SnapshotListener,
  type ApplyMoveResult,
} from './SessionRegistry';
