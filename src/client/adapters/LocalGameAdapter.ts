/**
 * Local Game Adapter
 *
 * Implements GameAdapter with an in-process SessionRegistry, for playing
 * without a server. Also handles save files.
 */

import { GameAdapter, ErrorCallback, StateChangeCallback } from './GameAdapter';
import {
  Direction,
  GameSnapshot,
  GridEngineOptions,
  SaveRecord,
  SessionRegistry,
  createSaveRecord,
  parseSaveRecord,
} from '../../shared/core';
import { DEFAULT_GRID_SIZE } from '../../shared/constants';
import { isGameError } from '../../shared/errors';

const LOCAL_KEY = 'local';

export class LocalGameAdapter implements GameAdapter {
  private _state: GameSnapshot | null = null;
  private stateChangeCallbacks: StateChangeCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];
  private unsubscribe?: () => void;

  private constructor(private readonly registry: SessionRegistry) {}

  /**
   * Create an adapter with a freshly seeded grid
   */
  static async create(
    size: number = DEFAULT_GRID_SIZE,
    engineOptions: GridEngineOptions = {}
  ): Promise<LocalGameAdapter> {
    const registry = new SessionRegistry({ name: 'local', engineOptions: () => engineOptions });
    const adapter = new LocalGameAdapter(registry);
    adapter._state = await registry.getOrCreate(LOCAL_KEY, size);
    adapter.unsubscribe = registry.subscribe(LOCAL_KEY, (state) => adapter.handleStateChange(state));
    return adapter;
  }

  get state(): GameSnapshot | null {
    return this._state;
  }

  get isOffline(): boolean {
    return true;
  }

  async move(direction: Direction): Promise<void> {
    await this.run(() => this.registry.applyMove(LOCAL_KEY, direction));
  }

  async newGame(size?: number): Promise<void> {
    await this.run(() => this.registry.reset(LOCAL_KEY, { size }));
  }

  /**
   * Save file of the current state
   */
  async save(now: Date = new Date()): Promise<SaveRecord> {
    return createSaveRecord(await this.registry.getSnapshot(LOCAL_KEY), now);
  }

  /**
   * Restore a save file. Invalid files are reported through onError and
   * leave the current game untouched.
   */
  async load(raw: unknown): Promise<void> {
    await this.run(() => this.registry.importState(LOCAL_KEY, parseSaveRecord(raw).game_state));
  }

  onStateChange(callback: StateChangeCallback): void {
    this.stateChangeCallbacks.push(callback);
  }

  onError(callback: ErrorCallback): void {
    this.errorCallbacks.push(callback);
  }

  destroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.registry.remove(LOCAL_KEY);
    this.stateChangeCallbacks = [];
    this.errorCallbacks = [];
  }

  private handleStateChange(state: GameSnapshot): void {
    this._state = state;
    this.stateChangeCallbacks.forEach((cb) => cb(state));
  }

  private async run(operation: () => Promise<unknown>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      if (!isGameError(error)) throw error;
      const message = { message: error.message, code: error.code, metadata: error.metadata };
      this.errorCallbacks.forEach((cb) => cb(message));
    }
  }
}
