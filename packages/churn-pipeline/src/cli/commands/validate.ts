/**
 * Validate Command
 *
 * Check a customer CSV against the ingestion rules without running anything.
 *
 * Usage:
 *   churnline validate customers.csv [--json]
 */

import { readFile } from 'node:fs/promises';
import { errorMessage } from '../../core/errors.js';
import { parseCsv } from '../../ingestion/table.js';
import { validateTable } from '../../ingestion/validator.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatValidationError, printError, printOutput, printWarning } from '../lib/output.js';

export interface ValidateOptions {
  readonly json?: boolean;
}

export async function validateCommand(file: string, options: ValidateOptions = {}): Promise<ExitCode> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    printError(`Could not read ${file}: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }

  const outcome = validateTable(parseCsv(content));

  if (options.json) {
    printOutput(
      formatJson(
        outcome.ok
          ? {
              valid: true,
              records: outcome.table.records.length,
              idColumn: outcome.table.idColumn,
              columns: outcome.table.columns,
              warnings: outcome.table.warnings,
            }
          : {
              valid: false,
              message: outcome.error.message,
              issues: outcome.error.issues,
              missingColumns: outcome.error.missingColumns,
            }
      )
    );
    return outcome.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
  }

  if (!outcome.ok) {
    printError(formatValidationError(outcome.error));
    return EXIT_CODES.ERRORS;
  }

  for (const warning of outcome.table.warnings) {
    printWarning(warning);
  }
  printOutput(
    `${file}: ${outcome.table.records.length} customers, ${outcome.table.columns.length} columns ` +
      `(identifier column '${outcome.table.idColumn}')`
  );
  return EXIT_CODES.SUCCESS;
}
