/**
 * Save records exchanged with the persistence collaborator
 *
 * The record is { timestamp, date, game_state, version }. Where it is stored
 * (file, browser storage, download) is up to the caller.
 */

import { GameSnapshot, SaveRecord } from './types';
import { isRecord, parseSnapshot } from './cells';
import { SAVE_VERSION } from '../constants';
import { createValidationFailedError } from '../errors';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:mm:ss"
 */
export function formatSaveDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createSaveRecord(snapshot: GameSnapshot, now: Date = new Date()): SaveRecord {
  return {
    timestamp: now.toISOString(),
    date: formatSaveDate(now),
    game_state: snapshot,
    version: SAVE_VERSION,
  };
}

/**
 * Validate an untrusted save record. The embedded game state goes through
 * the same structural checks as any imported snapshot.
 */
export function parseSaveRecord(raw: unknown): SaveRecord {
  if (!isRecord(raw)) {
    throw createValidationFailedError('Save record must be an object');
  }
  if (raw.game_state === undefined) {
    throw createValidationFailedError('Save record has no game_state');
  }

  return {
    timestamp: typeof raw.timestamp === 'string' ? raw.timestamp : '',
    date: typeof raw.date === 'string' ? raw.date : '',
    game_state: parseSnapshot(raw.game_state),
    version: typeof raw.version === 'string' ? raw.version : SAVE_VERSION,
  };
}
