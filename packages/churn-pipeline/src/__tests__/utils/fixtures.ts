/**
 * Shared test fixtures
 */

import type { RawTable, ValidatedTable } from '../../core/types.js';
import { validateTable } from '../../ingestion/validator.js';

/**
 * Three customers with every recommended feature column
 */
export function customerTable(): RawTable {
  return {
    columns: ['customerID', 'tenure', 'MonthlyCharges', 'Contract'],
    rows: [
      ['A', '2', '95', 'Month-to-month'],
      ['B', '30', '50', 'One year'],
      ['C', '60', '25', 'Two year'],
    ],
  };
}

export function validated(raw: RawTable = customerTable()): ValidatedTable {
  const outcome = validateTable(raw);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.table;
}

/**
 * Resolves after `ms`; lets a spawned child get going
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
