/**
 * Serving layer types
 */

import type {
  BatchSummary,
  ExecutionFailureReason,
  PredictionBatch,
  PredictionRecord,
  PredictionSource,
} from '../core/types.js';
import type { ScorerAvailability } from '../scoring/availability.js';

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
    readonly version: string;
  };
}

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'NO_INPUT'
  | 'BUSY'
  | 'EXECUTION_FAILED'
  | 'NO_BATCH'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'UNSUPPORTED_VERSION'
  | 'INTERNAL_ERROR';

// ============================================================================
// Payloads
// ============================================================================

export interface UploadResult {
  readonly records: number;
  readonly columns: readonly string[];
  readonly idColumn: string;
  readonly warnings: readonly string[];
}

/**
 * Batch as returned by /run and /predictions
 */
export interface BatchPayload {
  readonly batchId: string;
  readonly version: number;
  readonly source: PredictionSource;
  readonly createdAt: string;
  readonly summary: BatchSummary;
  readonly predictions: readonly PredictionRecord[];
  readonly fallbackReason?: ExecutionFailureReason;
}

export interface RunResult extends BatchPayload {
  readonly warnings: readonly string[];
  readonly durationMs: number;
}

export interface ModelInfo {
  readonly scorer: {
    readonly command: string;
    readonly args: readonly string[];
    readonly cwd: string | null;
    readonly timeoutMs: number;
    readonly channel: string;
  };
  readonly input: {
    readonly requiredColumns: readonly string[];
    readonly identifierAliases: readonly string[];
    readonly recommendedColumns: readonly string[];
  };
  readonly output: {
    readonly columns: readonly string[];
    readonly riskThresholds: { readonly low: number; readonly high: number };
  };
  readonly fallback: {
    readonly enabled: boolean;
    readonly seed: number;
    readonly jitter: number;
  };
}

// ============================================================================
// Health
// ============================================================================

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface FailureSample {
  readonly timestamp: number;
  readonly reason: ExecutionFailureReason;
  readonly detail: string;
}

export interface RunMetrics {
  /** Completed runs (model or simulated) */
  readonly total: number;
  readonly model: number;
  readonly simulated: number;
  /** Simulated runs that replaced a failed model run */
  readonly fallbacks: number;
  /** Failed model executions, recovered or not */
  readonly failed: number;
  /** Runs rejected because another was in flight */
  readonly rejected: number;
  readonly durationP50: number;
  readonly durationP95: number;
  readonly durationP99: number;
  readonly lastFailure: FailureSample | null;
}

export interface CurrentBatchMetrics {
  readonly batchId: string;
  readonly version: number;
  readonly source: PredictionSource;
  readonly records: number;
  readonly createdAt: string;
  readonly ageSeconds: number;
}

export interface HealthMetrics {
  readonly status: HealthStatus;
  readonly uptime: number;
  readonly scorer: ScorerAvailability | null;
  readonly fallbackEnabled: boolean;
  readonly currentBatch: CurrentBatchMetrics | null;
  readonly runs: RunMetrics;
  readonly failures: {
    readonly last5m: number;
    readonly last1h: number;
    readonly last24h: number;
  };
  readonly timestamp: number;
}

export function toBatchPayload(batch: PredictionBatch): BatchPayload {
  return {
    batchId: batch.batchId,
    version: batch.version,
    source: batch.source,
    createdAt: batch.createdAt,
    summary: batch.summary,
    predictions: batch.predictions,
    ...(batch.fallbackReason !== undefined ? { fallbackReason: batch.fallbackReason } : {}),
  };
}
