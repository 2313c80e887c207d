/**
 * Output Reader/Validator
 *
 * Turns the scoring process's artifact into a PredictionBatch. The artifact
 * must carry an identifier column and a probability column with values in
 * [0, 1], and its identifier set must equal the input's exactly: missing,
 * extra and repeated ids are errors, never dropped.
 *
 * Risk levels are always derived from the probability with the fixed
 * thresholds. A `risk_level` column in the artifact that disagrees is logged
 * and overridden.
 */

import { buildBatch, classifyRisk, isValidProbability } from '../core/batch.js';
import { ValidationError, type ValidationIssue } from '../core/errors.js';
import type { OutputHandle, PredictionBatch } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import {
  CANONICAL_ID_COLUMN,
  ID_COLUMN_ALIASES,
  PROBABILITY_COLUMN_ALIASES,
  RISK_LEVEL_COLUMN_ALIASES,
  findColumnIndex,
} from '../ingestion/columns.js';

const log = createLogger({ module: 'output-reader' });

export type ReadOutcome =
  | { readonly ok: true; readonly batch: PredictionBatch }
  | { readonly ok: false; readonly error: ValidationError };

export function readOutput(
  handle: OutputHandle,
  expectedIds: readonly string[],
  now?: Date
): ReadOutcome {
  const { columns, rows } = handle.table;
  const issues: ValidationIssue[] = [];

  const idIndex = findColumnIndex(columns, ID_COLUMN_ALIASES);
  const probabilityIndex = findColumnIndex(columns, PROBABILITY_COLUMN_ALIASES);
  const riskIndex = findColumnIndex(columns, RISK_LEVEL_COLUMN_ALIASES);

  if (idIndex === -1) {
    issues.push({
      code: 'missing-column',
      column: CANONICAL_ID_COLUMN,
      message: `Scoring output has no identifier column (${ID_COLUMN_ALIASES.join(', ')})`,
    });
  }
  if (probabilityIndex === -1) {
    issues.push({
      code: 'missing-column',
      column: 'churn_probability',
      message: `Scoring output has no probability column (${PROBABILITY_COLUMN_ALIASES.join(', ')})`,
    });
  }
  if (issues.length > 0) {
    return reject(handle, issues);
  }

  const expected = new Set(expectedIds);
  const probabilities = new Map<string, number>();
  const invalidRows: number[] = [];
  const duplicated = new Set<string>();
  const unexpected: string[] = [];
  let riskMismatches = 0;

  rows.forEach((row, index) => {
    const id = (row[idIndex] ?? '').trim();
    const probabilityText = (row[probabilityIndex] ?? '').trim();
    const probability = probabilityText === '' ? Number.NaN : Number(probabilityText);

    if (!isValidProbability(probability)) {
      invalidRows.push(index + 1);
      return;
    }
    if (!expected.has(id)) {
      unexpected.push(id);
      return;
    }
    if (probabilities.has(id)) {
      duplicated.add(id);
      return;
    }

    probabilities.set(id, probability);

    if (riskIndex !== -1) {
      const reported = (row[riskIndex] ?? '').trim();
      if (reported !== '' && reported.toLowerCase() !== classifyRisk(probability).toLowerCase()) {
        riskMismatches++;
      }
    }
  });

  if (invalidRows.length > 0) {
    issues.push({
      code: 'invalid-probability',
      rows: invalidRows,
      message: `${invalidRows.length} row(s) have a probability outside [0, 1] or not a number`,
    });
  }
  if (unexpected.length > 0) {
    issues.push({
      code: 'unexpected-identifier',
      ids: unexpected,
      message: `Scoring output contains ${unexpected.length} identifier(s) not in the input`,
    });
  }
  if (duplicated.size > 0) {
    issues.push({
      code: 'duplicate-identifier',
      ids: [...duplicated],
      message: `Scoring output repeats ${duplicated.size} identifier(s)`,
    });
  }

  const missing = expectedIds.filter((id) => !probabilities.has(id));
  // Ids on rows with an invalid probability are already counted there
  if (missing.length > 0 && invalidRows.length === 0) {
    issues.push({
      code: 'missing-identifier',
      ids: missing,
      message: `Scoring output is missing ${missing.length} identifier(s) from the input`,
    });
  }

  if (issues.length > 0) {
    return reject(handle, issues);
  }

  if (riskMismatches > 0) {
    log.warn('Scoring output risk levels disagree with fixed thresholds; using derived levels', {
      location: handle.location,
      mismatches: riskMismatches,
    });
  }

  const scored = expectedIds.map((id) => ({ id, churnProbability: probabilities.get(id) ?? 0 }));
  return { ok: true, batch: buildBatch(scored, { source: 'model', now }) };
}

function reject(handle: OutputHandle, issues: readonly ValidationIssue[]): ReadOutcome {
  return {
    ok: false,
    error: new ValidationError(
      `Malformed scoring output at ${handle.location}: ${issues.map((i) => i.message).join('; ')}`,
      issues
    ),
  };
}
