/**
 * Tabular codec
 *
 * CSV <-> RawTable conversion used for uploads, the exchange channel and the
 * download export. Handles quoted values, doubled quotes and CRLF line
 * endings. Quoted fields spanning several lines are not supported.
 *
 * @module ingestion/table
 */

import type { RawTable } from '../core/types.js';

/**
 * Parse CSV content. The first non-blank line is the header.
 * Returns an empty table for empty content.
 */
export function parseCsv(content: string): RawTable {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '');

  if (lines.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...body] = lines;
  return {
    columns: parseCsvLine(header ?? ''),
    rows: body.map((line) => parseCsvLine(line)),
  };
}

/**
 * Parse a single CSV line handling quoted values and `""` escapes
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize a table as CSV (LF line endings, trailing newline)
 */
export function formatCsv(table: RawTable): string {
  const lines = [table.columns, ...table.rows].map((cells) => cells.map(escapeCsv).join(','));
  return `${lines.join('\n')}\n`;
}

type JsonCell = string | number | boolean | null;

/**
 * Build a table from JSON row objects. Columns are the union of keys in
 * first-seen order; absent keys and nulls become empty cells.
 */
export function tableFromObjects(rows: readonly Readonly<Record<string, JsonCell>>[]): RawTable {
  const columns: string[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return {
    columns,
    rows: rows.map((row) => columns.map((column) => cellText(row[column]))),
  };
}

function cellText(value: JsonCell | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}
