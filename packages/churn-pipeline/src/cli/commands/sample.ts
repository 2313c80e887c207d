/**
 * Sample Command
 *
 * Write a deterministic sample customer CSV.
 *
 * Usage:
 *   churnline sample [--rows 25] [--seed 7] [--out sample.csv]
 */

import { errorMessage } from '../../core/errors.js';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { DEFAULT_SAMPLE_ROWS, generateSampleTable } from '../../ingestion/sample.js';
import { formatCsv } from '../../ingestion/table.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { printError, printOutput, printSuccess } from '../lib/output.js';

export interface SampleOptions {
  readonly rows?: number;
  readonly seed?: number;
  readonly out?: string;
}

export async function sampleCommand(options: SampleOptions = {}): Promise<ExitCode> {
  const rows = options.rows ?? DEFAULT_SAMPLE_ROWS;

  let csv: string;
  try {
    csv = formatCsv(generateSampleTable(rows, options.seed));
  } catch (error) {
    printError(errorMessage(error));
    return EXIT_CODES.ERRORS;
  }

  if (options.out === undefined) {
    printOutput(csv);
    return EXIT_CODES.SUCCESS;
  }

  try {
    await atomicWriteFile(options.out, csv);
  } catch (error) {
    printError(`Could not write ${options.out}: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }
  printSuccess(`Wrote ${rows} sample customers to ${options.out}`);
  return EXIT_CODES.SUCCESS;
}
