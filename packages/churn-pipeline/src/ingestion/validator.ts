/**
 * Ingestion Validator
 *
 * Checks an uploaded table for the structure the pipeline needs before any
 * scoring happens: an identifier column, at least one data row, rectangular
 * rows, non-blank and unique identifiers.
 *
 * POLICY: duplicate identifiers are rejected (every duplicated id is listed),
 * never silently deduplicated.
 *
 * Pure: no I/O, no logging, input is not mutated.
 */

import { ValidationError, type ValidationIssue } from '../core/errors.js';
import type { CustomerRecord, RawTable, ValidatedTable } from '../core/types.js';
import {
  CANONICAL_ID_COLUMN,
  ID_COLUMN_ALIASES,
  RECOMMENDED_FEATURE_COLUMNS,
  findColumnIndex,
  normalizeColumnName,
} from './columns.js';

export type ValidationOutcome =
  | { readonly ok: true; readonly table: ValidatedTable }
  | { readonly ok: false; readonly error: ValidationError };

/** Share of blank feature cells above which a warning is attached */
export const SPARSE_DATA_WARNING_RATIO = 0.2;

export function validateTable(raw: RawTable): ValidationOutcome {
  const issues: ValidationIssue[] = [];
  const columns = raw.columns.map((column) => column.trim());

  const duplicateColumns = findDuplicates(columns.map(normalizeColumnName));
  for (const normalized of duplicateColumns) {
    const column = columns.find((c) => normalizeColumnName(c) === normalized) ?? normalized;
    issues.push({
      code: 'duplicate-column',
      column,
      message: `Column appears more than once: ${column}`,
    });
  }

  const idIndex = findColumnIndex(columns, ID_COLUMN_ALIASES);
  if (idIndex === -1) {
    issues.push({
      code: 'missing-column',
      column: CANONICAL_ID_COLUMN,
      message: `Missing required column: ${CANONICAL_ID_COLUMN} (accepted: ${ID_COLUMN_ALIASES.join(', ')})`,
    });
  }

  if (raw.rows.length === 0) {
    issues.push({ code: 'empty-table', message: 'Table has no data rows' });
  }

  // Row-level checks need a usable header
  if (idIndex === -1 || issues.length > 0) {
    return reject(issues);
  }

  const raggedRows: number[] = [];
  const blankIdRows: number[] = [];
  const firstRowById = new Map<string, number>();
  const duplicateIds = new Set<string>();
  const records: CustomerRecord[] = [];
  let blankCells = 0;

  raw.rows.forEach((row, index) => {
    const rowNumber = index + 1;
    if (row.length !== columns.length) {
      raggedRows.push(rowNumber);
      return;
    }

    const cells = row.map((cell) => cell.trim());
    const id = cells[idIndex] ?? '';
    if (id === '') {
      blankIdRows.push(rowNumber);
      return;
    }

    if (firstRowById.has(id)) {
      duplicateIds.add(id);
      return;
    }
    firstRowById.set(id, rowNumber);

    // Own data properties only: a column may be named like an Object.prototype key
    const features: [string, string][] = [];
    cells.forEach((cell, columnIndex) => {
      if (columnIndex === idIndex) return;
      features.push([columns[columnIndex] ?? `column_${columnIndex + 1}`, cell]);
      if (cell === '') blankCells++;
    });

    records.push({ id, features: Object.freeze(Object.fromEntries(features)) });
  });

  if (raggedRows.length > 0) {
    issues.push({
      code: 'ragged-row',
      rows: raggedRows,
      message: `${raggedRows.length} row(s) do not have ${columns.length} cells: rows ${formatList(raggedRows)}`,
    });
  }
  if (blankIdRows.length > 0) {
    issues.push({
      code: 'blank-identifier',
      column: columns[idIndex],
      rows: blankIdRows,
      message: `${blankIdRows.length} row(s) have an empty identifier: rows ${formatList(blankIdRows)}`,
    });
  }
  if (duplicateIds.size > 0) {
    const ids = [...duplicateIds];
    issues.push({
      code: 'duplicate-identifier',
      column: columns[idIndex],
      ids,
      message: `Duplicate identifiers: ${formatList(ids)}`,
    });
  }

  if (issues.length > 0) {
    return reject(issues);
  }

  const idColumn = columns[idIndex] ?? CANONICAL_ID_COLUMN;
  return {
    ok: true,
    table: {
      idColumn,
      columns,
      records,
      warnings: collectWarnings(idColumn, columns, records.length, blankCells),
    },
  };
}

function collectWarnings(
  idColumn: string,
  columns: readonly string[],
  recordCount: number,
  blankCells: number
): string[] {
  const warnings: string[] = [];

  if (idColumn !== CANONICAL_ID_COLUMN) {
    warnings.push(`Using '${idColumn}' as the ${CANONICAL_ID_COLUMN} column`);
  }

  const missingRecommended = RECOMMENDED_FEATURE_COLUMNS.filter(
    (name) => findColumnIndex(columns, [name]) === -1
  );
  if (missingRecommended.length > 0) {
    warnings.push(
      `Missing recommended columns (simulated scores will ignore them): ${missingRecommended.join(', ')}`
    );
  }

  const featureCells = recordCount * (columns.length - 1);
  if (featureCells > 0 && blankCells / featureCells > SPARSE_DATA_WARNING_RATIO) {
    warnings.push(`High missing value percentage: ${((blankCells / featureCells) * 100).toFixed(1)}%`);
  }

  return warnings;
}

function reject(issues: readonly ValidationIssue[]): ValidationOutcome {
  const summary = issues.map((issue) => issue.message).join('; ');
  return { ok: false, error: new ValidationError(`Invalid input table: ${summary}`, issues) };
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

function formatList(values: readonly (string | number)[], limit = 10): string {
  const shown = values.slice(0, limit).join(', ');
  return values.length > limit ? `${shown} (+${values.length - limit} more)` : shown;
}
