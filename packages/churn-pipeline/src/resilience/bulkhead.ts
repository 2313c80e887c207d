/**
 * Bulkhead Isolation Pattern
 *
 * Caps concurrent executions of an operation and fails fast when the cap is
 * reached. The orchestrator uses a bulkhead of size one as its single-flight
 * gate in front of the external scoring process.
 *
 * DESIGN:
 * - Overflow is rejected, never queued
 * - The slot is released in `finally`, whatever the operation's outcome
 * - Rejections carry a retry hint derived from the mean duration of executions
 *   that resolved; a rejected operation says nothing about how long work takes
 */

import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'bulkhead' });

export interface BulkheadConfig {
  readonly name: string;
  readonly maxConcurrent: number;
  /** Retry hint used before any execution has completed */
  readonly defaultRetryAfterMs: number;
}

export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly maxConcurrent: number;
  readonly completedCount: number;
  /** Completed executions whose operation rejected */
  readonly failedCount: number;
  readonly rejectedCount: number;
  /** Mean duration of executions that resolved */
  readonly averageExecutionMs: number;
  /** Start time of the oldest in-flight execution, if any */
  readonly oldestActiveStartedAt: number | null;
}

/**
 * Bulkhead rejection error (thrown when capacity exceeded)
 */
export class BulkheadRejectionError extends Error {
  readonly bulkheadName: string;
  readonly stats: BulkheadStats;
  readonly retryAfterMs: number;

  constructor(bulkheadName: string, stats: BulkheadStats, retryAfterMs: number) {
    super(`Bulkhead '${bulkheadName}' capacity exceeded`);
    this.name = 'BulkheadRejectionError';
    this.bulkheadName = bulkheadName;
    this.stats = stats;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * @example
 * ```typescript
 * const gate = new Bulkhead({ name: 'scoring-process', maxConcurrent: 1, defaultRetryAfterMs: 5000 });
 * const result = await gate.execute(() => invokeScorer(table));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  /** execution id → start time */
  private readonly activeStarts = new Map<number, number>();
  private nextExecutionId = 0;
  private activeCount = 0;
  private rejectedCount = 0;
  private completedCount = 0;
  private failedCount = 0;
  private succeededCount = 0;
  private totalSucceededMs = 0;

  constructor(config: BulkheadConfig) {
    if (config.maxConcurrent < 1) {
      throw new Error(`Bulkhead '${config.name}' needs maxConcurrent >= 1`);
    }
    this.config = config;
  }

  /**
   * Execute function with bulkhead protection
   *
   * @throws BulkheadRejectionError when every slot is taken
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount >= this.config.maxConcurrent) {
      this.rejectedCount++;
      const stats = this.getStats();
      log.debug('Execution rejected', { bulkhead: this.config.name, active: stats.activeCount });
      throw new BulkheadRejectionError(this.config.name, stats, this.estimateRetryAfterMs());
    }

    this.activeCount++;
    const startTime = Date.now();
    const executionId = this.nextExecutionId++;
    this.activeStarts.set(executionId, startTime);

    try {
      const result = await fn();
      this.succeededCount++;
      this.totalSucceededMs += Date.now() - startTime;
      return result;
    } catch (error) {
      this.failedCount++;
      throw error;
    } finally {
      this.activeStarts.delete(executionId);
      this.activeCount--;
      this.completedCount++;
    }
  }

  get isSaturated(): boolean {
    return this.activeCount >= this.config.maxConcurrent;
  }

  getStats(): BulkheadStats {
    const starts = [...this.activeStarts.values()];
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      maxConcurrent: this.config.maxConcurrent,
      completedCount: this.completedCount,
      failedCount: this.failedCount,
      rejectedCount: this.rejectedCount,
      averageExecutionMs:
        this.succeededCount > 0 ? Math.round(this.totalSucceededMs / this.succeededCount) : 0,
      oldestActiveStartedAt: starts.length > 0 ? Math.min(...starts) : null,
    };
  }

  /**
   * Expected wait until a slot frees: mean duration minus time already spent
   * by the oldest in-flight execution, never below one second.
   */
  private estimateRetryAfterMs(): number {
    const stats = this.getStats();
    const expected =
      stats.averageExecutionMs > 0 ? stats.averageExecutionMs : this.config.defaultRetryAfterMs;
    const spent = stats.oldestActiveStartedAt !== null ? Date.now() - stats.oldestActiveStartedAt : 0;
    return Math.max(1000, expected - spent);
  }
}
