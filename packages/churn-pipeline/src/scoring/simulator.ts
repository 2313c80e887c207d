/**
 * Fallback Simulator
 *
 * Heuristic churn scores computed from whatever feature columns are present.
 * Used automatically when the external scoring process fails, and on demand
 * for demo runs. Output satisfies every batch invariant and is tagged
 * `source: 'simulated'`.
 *
 * HEURISTICS (each adds to a base score of 0.25, absent or unparseable
 * features contribute nothing):
 * - tenure (months): < 6 → +0.25, < 12 → +0.15, < 24 → +0.05, ≥ 48 → −0.10
 * - MonthlyCharges: > 90 → +0.20, > 70 → +0.10, < 30 → −0.05
 * - Contract: month-to-month → +0.20, one year → −0.05, two year → −0.15
 * - jitter: uniform in [−jitter, +jitter] from a seeded PRNG
 * The result is clipped to [0, 1] and rounded to 4 decimals.
 */

import { buildBatch, roundProbability } from '../core/batch.js';
import type { CustomerRecord, ExecutionFailureReason, PredictionBatch, ValidatedTable } from '../core/types.js';
import { normalizeColumnName } from '../ingestion/columns.js';

export interface SimulatorOptions {
  /** PRNG seed; the same seed and input always give the same scores */
  readonly seed?: number;
  /** Half-width of the random jitter, clamped to [0, 0.25] */
  readonly jitter?: number;
  /** Set when the simulation replaces a failed model run */
  readonly fallbackReason?: ExecutionFailureReason;
  readonly now?: Date;
}

export const DEFAULT_SIMULATOR_SEED = 42;
export const DEFAULT_SIMULATOR_JITTER = 0.05;
const MAX_JITTER = 0.25;
const BASE_SCORE = 0.25;

export function simulate(table: ValidatedTable, options: SimulatorOptions = {}): PredictionBatch {
  const random = mulberry32(options.seed ?? DEFAULT_SIMULATOR_SEED);
  const jitter = Math.min(MAX_JITTER, Math.max(0, options.jitter ?? DEFAULT_SIMULATOR_JITTER));

  const scored = table.records.map((record) => {
    const noise = jitter > 0 ? (random() * 2 - 1) * jitter : 0;
    return {
      id: record.id,
      churnProbability: roundProbability(clip(heuristicScore(record) + noise)),
    };
  });

  return buildBatch(scored, {
    source: 'simulated',
    fallbackReason: options.fallbackReason,
    now: options.now,
  });
}

/**
 * Deterministic part of the score (before jitter and clipping)
 */
export function heuristicScore(record: CustomerRecord): number {
  let score = BASE_SCORE;

  const tenure = numericFeature(record, 'tenure');
  if (tenure !== null) {
    if (tenure < 6) score += 0.25;
    else if (tenure < 12) score += 0.15;
    else if (tenure < 24) score += 0.05;
    else if (tenure >= 48) score -= 0.1;
  }

  const monthlyCharges = numericFeature(record, 'MonthlyCharges');
  if (monthlyCharges !== null) {
    if (monthlyCharges > 90) score += 0.2;
    else if (monthlyCharges > 70) score += 0.1;
    else if (monthlyCharges < 30) score -= 0.05;
  }

  const contract = textFeature(record, 'Contract');
  if (contract !== null) {
    const normalized = contract.toLowerCase().replace(/[\s_-]+/g, '');
    if (normalized === 'monthtomonth' || normalized === 'monthly') score += 0.2;
    else if (normalized === 'oneyear') score -= 0.05;
    else if (normalized === 'twoyear') score -= 0.15;
  }

  return score;
}

function textFeature(record: CustomerRecord, name: string): string | null {
  const wanted = normalizeColumnName(name);
  for (const [column, value] of Object.entries(record.features)) {
    if (normalizeColumnName(column) === wanted && value.trim() !== '') {
      return value.trim();
    }
  }
  return null;
}

function numericFeature(record: CustomerRecord, name: string): number | null {
  const text = textFeature(record, name);
  if (text === null) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function clip(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * mulberry32 PRNG: small, fast, seedable. Returns floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
