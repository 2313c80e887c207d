/**
 * Batch export
 *
 * The download artifact carries exactly three columns, in this order, so a
 * download taken right after a run matches the run response row for row.
 */

import type { PredictionBatch, RawTable } from '../core/types.js';
import { CANONICAL_ID_COLUMN } from '../ingestion/columns.js';
import { formatCsv } from '../ingestion/table.js';

export const DOWNLOAD_COLUMNS: readonly string[] = [CANONICAL_ID_COLUMN, 'churn_probability', 'risk_level'];

export const DOWNLOAD_FILE_NAME = 'churn_predictions.csv';

export function batchToTable(batch: PredictionBatch): RawTable {
  return {
    columns: DOWNLOAD_COLUMNS,
    rows: batch.predictions.map((prediction) => [
      prediction.id,
      String(prediction.churnProbability),
      prediction.riskLevel,
    ]),
  };
}

export function formatBatchCsv(batch: PredictionBatch): string {
  return formatCsv(batchToTable(batch));
}
