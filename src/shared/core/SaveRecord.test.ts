import { createSaveRecord, formatSaveDate, parseSaveRecord } from './SaveRecord';
import { GridEngine } from './GridEngine';
import { SAVE_VERSION } from '../constants';
import { GameErrorCode } from '../errors';

describe('SaveRecord', () => {
  const savedAt = new Date(2024, 0, 5, 9, 3, 7);

  it('should format the date in local time', () => {
    expect(formatSaveDate(savedAt)).toBe('2024-01-05 09:03:07');
  });

  it('should wrap a snapshot with timestamp, date and version', () => {
    const snapshot = new GridEngine(4, { random: () => 0 }).snapshot();

    expect(createSaveRecord(snapshot, savedAt)).toEqual({
      timestamp: savedAt.toISOString(),
      date: '2024-01-05 09:03:07',
      game_state: snapshot,
      version: SAVE_VERSION,
    });
  });

  it('should read back a record it wrote', () => {
    const snapshot = new GridEngine(3, { random: () => 0 }).snapshot();
    const record = createSaveRecord(snapshot, savedAt);

    expect(parseSaveRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it('should default a missing version', () => {
    const record = parseSaveRecord({ game_state: { grid: [[0, 0], [0, 2]], size: 2 } });

    expect(record.version).toBe(SAVE_VERSION);
    expect(record.timestamp).toBe('');
    expect(record.game_state.score).toBe(0);
  });

  it('should reject records without a game state', () => {
    expect(() => parseSaveRecord({ version: '2.1.0' })).toThrow(
      expect.objectContaining({ code: GameErrorCode.VALIDATION_FAILED })
    );
    expect(() => parseSaveRecord([])).toThrow(
      expect.objectContaining({ code: GameErrorCode.VALIDATION_FAILED })
    );
  });

  it('should reject a corrupt embedded grid', () => {
    expect(() => parseSaveRecord({ game_state: { grid: [[5, 0], [0, 0]], size: 2 } })).toThrow(
      expect.objectContaining({ code: GameErrorCode.STATE_CORRUPTION })
    );
  });
});
