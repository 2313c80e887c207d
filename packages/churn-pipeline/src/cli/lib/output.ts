/**
 * Output Formatting for CLI Commands
 *
 * Results go to stdout (tables, JSON, CSV); diagnostics go to stderr so
 * `churnline run data.csv --json | jq` and `churnline sample > x.csv` stay clean.
 *
 * @module cli/lib/output
 */

import type { ValidationError } from '../../core/errors.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Format data as an aligned text table
 */
export function formatTable(data: readonly Readonly<Record<string, unknown>>[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const render = (column: TableColumn, row: Readonly<Record<string, unknown>>): string => {
    const value = row[column.key];
    return column.formatter ? column.formatter(value) : String(value ?? '');
  };

  const widths = columns.map((column) =>
    Math.max(column.header.length, ...data.map((row) => render(column, row).length))
  );

  const pad = (value: string, index: number, align: TableColumn['align']): string => {
    const width = widths[index] ?? value.length;
    return align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((column, i) => pad(column.header, i, column.align)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((column, i) => pad(render(column, row), i, column.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Human-readable list of validation issues
 */
export function formatValidationError(error: ValidationError): string {
  const lines = [error.message];
  for (const issue of error.issues) {
    lines.push(`  - [${issue.code}] ${issue.message}`);
  }
  return lines.join('\n');
}

export function printOutput(output: string): void {
  process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printSuccess(message: string): void {
  console.error(`Success: ${message}`);
}

export function printWarning(message: string): void {
  console.error(`Warning: ${message}`);
}
