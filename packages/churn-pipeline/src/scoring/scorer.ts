/**
 * Scorers
 *
 * One capability, two variants:
 * - ModelScorer: runs the external process, then validates its artifact
 * - SimulatedScorer: heuristic scores computed in process
 *
 * Both honor the same contract; the pipeline's fallback policy picks which
 * one runs and when the second one takes over.
 */

import type { ExecutionFailureReason, PredictionBatch, ValidatedTable } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { ExecutionOrchestrator, RunOptions } from './orchestrator.js';
import { readOutput } from './output-reader.js';
import { simulate, type SimulatorOptions } from './simulator.js';

const log = createLogger({ module: 'scorer' });

export type ScoreOutcome =
  | { readonly ok: true; readonly batch: PredictionBatch }
  | { readonly ok: false; readonly reason: ExecutionFailureReason; readonly detail: string };

export interface ScoreContext extends RunOptions {
  /** Reason recorded on a simulated batch that replaces a failed model run */
  readonly fallbackReason?: ExecutionFailureReason;
  /** Called when the process has finished and its artifact is being read */
  readonly onPhase?: (phase: 'reading') => void;
}

export interface Scorer {
  readonly kind: PredictionBatch['source'];
  /**
   * @throws BusyError (model scorer only) when the process is already running
   */
  score(table: ValidatedTable, context?: ScoreContext): Promise<ScoreOutcome>;
}

export class ModelScorer implements Scorer {
  readonly kind = 'model' as const;

  constructor(private readonly orchestrator: ExecutionOrchestrator) {}

  async score(table: ValidatedTable, context: ScoreContext = {}): Promise<ScoreOutcome> {
    const result = await this.orchestrator.run(table, {
      timeoutMs: context.timeoutMs,
      signal: context.signal,
    });
    if (!result.ok) {
      return { ok: false, reason: result.reason, detail: result.detail };
    }

    context.onPhase?.('reading');
    const expectedIds = table.records.map((record) => record.id);
    const read = readOutput(result.handle, expectedIds);
    if (!read.ok) {
      log.warn('Rejected scoring output', { issues: read.error.issues.map((issue) => issue.code) });
      return { ok: false, reason: 'malformed-output', detail: read.error.message };
    }
    return { ok: true, batch: read.batch };
  }
}

export class SimulatedScorer implements Scorer {
  readonly kind = 'simulated' as const;

  constructor(private readonly options: Omit<SimulatorOptions, 'fallbackReason'> = {}) {}

  async score(table: ValidatedTable, context: ScoreContext = {}): Promise<ScoreOutcome> {
    return {
      ok: true,
      batch: simulate(table, { ...this.options, fallbackReason: context.fallbackReason }),
    };
  }
}
