/**
 * Prediction Pipeline
 *
 * Drives one run through the state machine
 *
 *   idle → validating → executing → reading | simulating → cached → idle
 *
 * - a validation failure throws ValidationError and leaves the store untouched
 * - an execution failure moves to `simulating` (automatic fallback), or to the
 *   terminal `failed` state with an ExecutionError when fallback is disabled
 * - demo mode goes straight from `validating` to `simulating`
 * - a run aborted through its signal throws CancelledError; it is neither
 *   simulated nor cached, and does not count as a scorer failure
 *
 * Runs are single flight: a run requested while another is active is rejected
 * with BusyError, so `state` always describes exactly one run.
 */

import { BusyError, CancelledError, ExecutionError, ValidationError, isBusyError } from '../core/errors.js';
import type {
  ExecutionFailureReason,
  PredictionBatch,
  PredictionSource,
  RawTable,
  ValidatedTable,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { validateTable } from '../ingestion/validator.js';
import { Bulkhead, BulkheadRejectionError } from '../resilience/bulkhead.js';
import type { ScoreOutcome, Scorer } from '../scoring/scorer.js';
import type { ResultStore } from './result-store.js';

const log = createLogger({ module: 'pipeline' });

export type RunState =
  | 'idle'
  | 'validating'
  | 'executing'
  | 'reading'
  | 'simulating'
  | 'cached'
  | 'failed';

/** `model` tries the external process first; `demo` only simulates */
export type RunMode = 'model' | 'demo';

export interface PipelineOptions {
  /** When false, execution failures surface as ExecutionError */
  readonly fallbackEnabled: boolean;
  /** Retry hint for rejected runs before any run has completed */
  readonly defaultRetryAfterMs?: number;
}

export interface PipelineRunOptions {
  readonly mode?: RunMode;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface RunReport {
  /** The batch as stored (version stamped) */
  readonly batch: PredictionBatch;
  readonly warnings: readonly string[];
  readonly durationMs: number;
}

/**
 * Receives run outcomes (health metrics)
 */
export interface RunRecorder {
  recordRun(source: PredictionSource, durationMs: number, fallbackReason?: ExecutionFailureReason): void;
  recordFailure(reason: ExecutionFailureReason, detail: string): void;
  recordRejected(): void;
}

export interface PipelineDependencies {
  readonly modelScorer: Scorer;
  readonly simulatedScorer: Scorer;
  readonly store: ResultStore;
  readonly recorder?: RunRecorder;
}

export type StateListener = (state: RunState, previous: RunState) => void;

export class PredictionPipeline {
  private currentState: RunState = 'idle';
  private staged: ValidatedTable | null = null;
  private readonly gate: Bulkhead;
  private readonly listeners = new Set<StateListener>();

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.gate = new Bulkhead({
      name: 'prediction-run',
      maxConcurrent: 1,
      defaultRetryAfterMs: options.defaultRetryAfterMs ?? 5000,
    });
  }

  get state(): RunState {
    return this.currentState;
  }

  get fallbackEnabled(): boolean {
    return this.options.fallbackEnabled;
  }

  get isRunning(): boolean {
    return this.gate.isSaturated;
  }

  /** Latest table accepted by `stage` */
  get stagedTable(): ValidatedTable | null {
    return this.staged;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Validate an upload and keep it for the next run without input.
   * Never touches the result store.
   *
   * @throws ValidationError
   */
  stage(raw: RawTable): ValidatedTable {
    const outcome = validateTable(raw);
    if (!outcome.ok) {
      throw outcome.error;
    }
    this.staged = outcome.table;
    log.info('Upload staged', {
      records: outcome.table.records.length,
      idColumn: outcome.table.idColumn,
      warnings: outcome.table.warnings.length,
    });
    return outcome.table;
  }

  /**
   * Run the pipeline on `input`, or on the staged upload when omitted
   *
   * @throws ValidationError, BusyError, CancelledError, ExecutionError (fallback disabled)
   */
  async run(input?: RawTable, options: PipelineRunOptions = {}): Promise<RunReport> {
    try {
      return await this.gate.execute(() => this.execute(input, options));
    } catch (error) {
      if (error instanceof BulkheadRejectionError) {
        this.deps.recorder?.recordRejected();
        throw new BusyError(error.retryAfterMs);
      }
      if (isBusyError(error)) {
        this.deps.recorder?.recordRejected();
      }
      throw error;
    }
  }

  private async execute(input: RawTable | undefined, options: PipelineRunOptions): Promise<RunReport> {
    const startTime = Date.now();
    const mode = options.mode ?? 'model';

    try {
      this.transition('validating');
      const table = this.resolveInput(input);

      let outcome: ScoreOutcome;
      if (mode === 'demo') {
        this.transition('simulating');
        outcome = await this.deps.simulatedScorer.score(table);
      } else {
        this.transition('executing');
        outcome = await this.deps.modelScorer.score(table, {
          timeoutMs: options.timeoutMs,
          signal: options.signal,
          onPhase: (phase) => this.transition(phase),
        });

        if (!outcome.ok) {
          if (options.signal?.aborted === true) {
            log.info('Prediction run cancelled', { reason: outcome.reason, detail: outcome.detail });
            throw new CancelledError();
          }
          this.deps.recorder?.recordFailure(outcome.reason, outcome.detail);
          if (!this.options.fallbackEnabled) {
            this.transition('failed');
            throw new ExecutionError(outcome.reason, outcome.detail);
          }
          log.warn('Falling back to simulated predictions', { reason: outcome.reason });
          this.transition('simulating');
          outcome = await this.deps.simulatedScorer.score(table, { fallbackReason: outcome.reason });
        }
      }

      if (!outcome.ok) {
        this.transition('failed');
        throw new ExecutionError(outcome.reason, outcome.detail);
      }

      const stored = this.deps.store.set(outcome.batch);
      this.transition('cached');

      const durationMs = Date.now() - startTime;
      this.deps.recorder?.recordRun(stored.source, durationMs, stored.fallbackReason);
      log.info('Prediction run completed', {
        mode,
        source: stored.source,
        records: stored.summary.total,
        high: stored.summary.high,
        durationMs,
      });

      this.transition('idle');
      return { batch: stored, warnings: table.warnings, durationMs };
    } catch (error) {
      if (this.currentState !== 'failed') {
        this.transition('idle');
      }
      throw error;
    }
  }

  private resolveInput(input: RawTable | undefined): ValidatedTable {
    if (input === undefined) {
      if (this.staged === null) {
        throw new ValidationError('No customer data has been uploaded', [
          { code: 'empty-table', message: 'No customer data has been uploaded' },
        ]);
      }
      return this.staged;
    }

    const outcome = validateTable(input);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.table;
  }

  private transition(next: RunState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    log.debug('Run state changed', { from: previous, to: next });
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
