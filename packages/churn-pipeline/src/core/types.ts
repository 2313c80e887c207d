/**
 * Churnline Core Types
 *
 * Shared data model for the prediction pipeline: raw and validated tables,
 * prediction records, batches and execution results.
 *
 * TYPE SAFETY: Everything crossing a module boundary is readonly. Batches are
 * frozen after construction (see core/batch.ts).
 */

// ============================================================================
// Tabular Input
// ============================================================================

/**
 * Untyped table as received from an upload (CSV or JSON rows)
 */
export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

/**
 * Single customer row after validation
 */
export interface CustomerRecord {
  /** Unique, non-empty identifier */
  readonly id: string;
  /** Remaining cells keyed by column name (trimmed cell text) */
  readonly features: Readonly<Record<string, string>>;
}

/**
 * Table that passed ingestion validation
 */
export interface ValidatedTable {
  /** Identifier column name as it appeared in the input */
  readonly idColumn: string;
  /** All column names in input order, identifier included */
  readonly columns: readonly string[];
  readonly records: readonly CustomerRecord[];
  /** Non-fatal findings (renamed id column, sparse data, ...) */
  readonly warnings: readonly string[];
}

// ============================================================================
// Predictions
// ============================================================================

export type RiskLevel = 'Low' | 'Medium' | 'High';

/**
 * Where a batch came from. Consumers must never mistake one for the other.
 */
export type PredictionSource = 'model' | 'simulated';

export interface PredictionRecord {
  readonly id: string;
  /** Estimated churn likelihood in [0, 1] */
  readonly churnProbability: number;
  readonly riskLevel: RiskLevel;
}

export interface BatchSummary {
  readonly total: number;
  readonly low: number;
  readonly medium: number;
  readonly high: number;
  readonly meanProbability: number;
}

export interface PredictionBatch {
  readonly batchId: string;
  /** Store version assigned when the batch became current (0 before that) */
  readonly version: number;
  readonly source: PredictionSource;
  /** ISO-8601 creation time */
  readonly createdAt: string;
  readonly predictions: readonly PredictionRecord[];
  readonly summary: BatchSummary;
  /** Set when a simulated batch replaced a failed model run */
  readonly fallbackReason?: ExecutionFailureReason;
}

// ============================================================================
// Execution
// ============================================================================

export type ExecutionFailureReason = 'timeout' | 'crash' | 'missing-output' | 'malformed-output';

/**
 * Handle to the artifact produced by a successful scoring run
 */
export interface OutputHandle {
  /** Channel-specific location of the artifact (file path for the file channel) */
  readonly location: string;
  /** Parsed artifact contents */
  readonly table: RawTable;
  readonly durationMs: number;
}

export type ExecutionResult =
  | { readonly ok: true; readonly handle: OutputHandle }
  | {
      readonly ok: false;
      readonly reason: ExecutionFailureReason;
      readonly detail: string;
      readonly durationMs: number;
    };
