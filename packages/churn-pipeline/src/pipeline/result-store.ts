/**
 * Result Store
 *
 * Holds the single current prediction batch. `set` swaps one reference to a
 * frozen batch, so a reader sees either the previous batch or the new one,
 * never a mix. Ordering is last-write-wins: the most recently completed run
 * becomes current.
 */

import { withVersion } from '../core/batch.js';
import type { PredictionBatch } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'result-store' });

export type StoreListener = (current: PredictionBatch | null) => void;

export class ResultStore {
  private current: PredictionBatch | null = null;
  private versionCounter = 0;
  private readonly listeners = new Set<StoreListener>();

  /**
   * Make `batch` current. Returns the stored copy, stamped with its version.
   */
  set(batch: PredictionBatch): PredictionBatch {
    const stored = withVersion(batch, ++this.versionCounter);
    this.current = stored;
    log.debug('Current batch replaced', {
      batchId: stored.batchId,
      version: stored.version,
      source: stored.source,
      records: stored.summary.total,
    });
    this.notify();
    return stored;
  }

  getCurrent(): PredictionBatch | null {
    return this.current;
  }

  clear(): void {
    if (this.current === null) return;
    this.current = null;
    this.versionCounter++;
    this.notify();
  }

  /** Incremented on every set and effective clear */
  get version(): number {
    return this.versionCounter;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (error) {
        log.error('Store listener failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
