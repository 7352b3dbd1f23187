/**
 * SessionRegistry - key -> GridEngine ownership table
 *
 * Each key (HTTP session id or room key) owns exactly one GridEngine.
 * Every mutation and every snapshot read of an entry runs inside that
 * entry's lock, a promise chain private to the entry, so two keys never
 * wait on each other while operations on one key run one at a time in
 * arrival order.
 *
 * Snapshots are copied while the lock is held and handed out after it is
 * released. Change listeners run after release as well.
 */

import { GridEngine } from './GridEngine';
import { cloneSnapshot } from './cells';
import { Direction, GameSnapshot, GridEngineOptions, ResetOptions } from './types';
import { createKeyNotFoundError } from '../errors';
import { Logger, createLogger } from '../logger';

export type SnapshotListener = (snapshot: GameSnapshot, key: string) => void;

export interface ApplyMoveResult {
  moved: boolean;
  snapshot: GameSnapshot;
}

export interface SessionRegistryOptions {
  /** Name used in log lines ("sessions", "rooms") */
  name?: string;

  /** Builds the engine options for a new entry (random source, callbacks) */
  engineOptions?: (key: string) => GridEngineOptions;

  logger?: Logger;
}

interface RegistryEntry {
  key: string;
  engine: GridEngine;
  queue: Promise<void>;
  listeners: Set<SnapshotListener>;
}

export class SessionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly engineOptions: (key: string) => GridEngineOptions;
  private readonly logger: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.engineOptions = options.engineOptions ?? (() => ({}));
    this.logger = options.logger ?? createLogger('Registry').child(options.name ?? 'sessions');
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Return the state for key, creating the entry on first reference.
   * Check-and-insert happens before the first await, so concurrent callers
   * for the same unseen key all end up with the one entry.
   */
  async getOrCreate(key: string, defaultSize: number): Promise<GameSnapshot> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = {
        key,
        engine: new GridEngine(defaultSize, this.engineOptions(key)),
        queue: Promise.resolve(),
        listeners: new Set(),
      };
      this.entries.set(key, entry);
      this.logger.debug('Entry created', { key, size: defaultSize });
    }
    return this.withEntryLock(entry, (engine) => engine.snapshot());
  }

  async getSnapshot(key: string): Promise<GameSnapshot> {
    return this.withEntryLock(this.requireEntry(key), (engine) => engine.snapshot());
  }

  /**
   * Apply one move (slide, spawn, rescoring, terminal check) under the lock
   */
  async applyMove(key: string, direction: Direction): Promise<ApplyMoveResult> {
    const entry = this.requireEntry(key);
    const result = await this.withEntryLock(entry, (engine) => {
      const { moved } = engine.move(direction);
      return { moved, snapshot: engine.snapshot() };
    });

    if (result.moved) {
      this.notify(entry, result.snapshot);
    }
    return result;
  }

  /**
   * Replace the entry's grid with a fresh one. Size defaults to the current
   * size; the high score is kept unless preserveHighScore is false.
   */
  async reset(key: string, options: ResetOptions = {}): Promise<GameSnapshot> {
    const entry = this.requireEntry(key);
    const snapshot = await this.withEntryLock(entry, (engine) => {
      engine.reset(options);
      return engine.snapshot();
    });
    this.notify(entry, snapshot);
    return snapshot;
  }

  /**
   * Load a saved snapshot into the entry (high score = max of both)
   */
  async importState(key: string, raw: unknown): Promise<GameSnapshot> {
    const entry = this.requireEntry(key);
    const snapshot = await this.withEntryLock(entry, (engine) => {
      engine.importState(raw);
      return engine.snapshot();
    });
    this.notify(entry, snapshot);
    return snapshot;
  }

  /**
   * Drop the entry and its listeners. No-op when the key is unknown.
   */
  remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    entry.listeners.clear();
    this.entries.delete(key);
    this.logger.debug('Entry removed', { key });
  }

  /**
   * Listen for state changes of one key
   *
   * @returns Function that removes the listener
   */
  subscribe(key: string, listener: SnapshotListener): () => void {
    const entry = this.requireEntry(key);
    entry.listeners.add(listener);
    return () => {
      entry.listeners.delete(listener);
    };
  }

  clear(): void {
    this.entries.forEach((entry) => entry.listeners.clear());
    this.entries.clear();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireEntry(key: string): RegistryEntry {
    const entry = this.entries.get(key);
    if (!entry) {
      throw createKeyNotFoundError(key);
    }
    return entry;
  }

  private async withEntryLock<T>(entry: RegistryEntry, task: (engine: GridEngine) => T): Promise<T> {
    const previous = entry.queue;
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    entry.queue = previous.then(() => current);

    await previous;
    try {
      // Work queued before a remove() must not touch the detached engine
      if (this.entries.get(entry.key) !== entry) {
        throw createKeyNotFoundError(entry.key);
      }
      return task(entry.engine);
    } finally {
      release?.();
    }
  }

  private notify(entry: RegistryEntry, snapshot: GameSnapshot): void {
    entry.listeners.forEach((listener) => {
      try {
        listener(cloneSnapshot(snapshot), entry.key);
      } catch (error) {
        this.logger.error(`Listener for ${entry.key} failed`, error);
      }
    });
  }
}
