/**
 * Batch construction helpers
 *
 * Risk classification, summary statistics and the single constructor every
 * PredictionBatch goes through, whichever scorer produced it.
 */

import { randomBytes } from 'node:crypto';
import type {
  BatchSummary,
  ExecutionFailureReason,
  PredictionBatch,
  PredictionRecord,
  PredictionSource,
  RiskLevel,
} from './types.js';

/**
 * Fixed risk thresholds: p < LOW_UPPER is Low, p > HIGH_LOWER is High,
 * everything in between (bounds included) is Medium.
 */
export const RISK_THRESHOLDS = {
  LOW_UPPER: 0.3,
  HIGH_LOWER: 0.7,
} as const;

export function classifyRisk(probability: number): RiskLevel {
  if (probability < RISK_THRESHOLDS.LOW_UPPER) return 'Low';
  if (probability > RISK_THRESHOLDS.HIGH_LOWER) return 'High';
  return 'Medium';
}

export function isValidProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Per-level counts and mean probability (0 for an empty list)
 */
export function summarize(predictions: readonly PredictionRecord[]): BatchSummary {
  let low = 0;
  let medium = 0;
  let high = 0;
  let sum = 0;

  for (const prediction of predictions) {
    sum += prediction.churnProbability;
    switch (prediction.riskLevel) {
      case 'Low':
        low++;
        break;
      case 'Medium':
        medium++;
        break;
      case 'High':
        high++;
        break;
    }
  }

  const total = predictions.length;
  return {
    total,
    low,
    medium,
    high,
    meanProbability: total > 0 ? roundProbability(sum / total) : 0,
  };
}

export function roundProbability(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export interface BuildBatchOptions {
  readonly source: PredictionSource;
  readonly fallbackReason?: ExecutionFailureReason;
  readonly now?: Date;
}

/**
 * Build a frozen batch from (id, probability) pairs. Risk levels are always
 * derived here so that both scorers agree on the thresholds.
 */
export function buildBatch(
  scored: readonly { readonly id: string; readonly churnProbability: number }[],
  options: BuildBatchOptions
): PredictionBatch {
  const predictions: PredictionRecord[] = scored.map(({ id, churnProbability }) =>
    Object.freeze({ id, churnProbability, riskLevel: classifyRisk(churnProbability) })
  );

  const batch: PredictionBatch = {
    batchId: `batch_${randomBytes(8).toString('hex')}`,
    version: 0,
    source: options.source,
    createdAt: (options.now ?? new Date()).toISOString(),
    predictions: Object.freeze(predictions),
    summary: Object.freeze(summarize(predictions)),
    ...(options.fallbackReason !== undefined && { fallbackReason: options.fallbackReason }),
  };

  return Object.freeze(batch);
}

/**
 * Copy of a batch stamped with its store version
 */
export function withVersion(batch: PredictionBatch, version: number): PredictionBatch {
  return Object.freeze({ ...batch, version });
}
