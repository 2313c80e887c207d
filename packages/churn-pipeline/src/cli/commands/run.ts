/**
 * Run Command
 *
 * Score a customer CSV once: validate, run the configured scoring process
 * (or simulate with --demo), print the summary and optionally write the
 * download CSV.
 *
 * Usage:
 *   churnline run customers.csv [--demo] [--no-fallback] [--timeout 60000]
 *                               [--out predictions.csv] [--json]
 */

import { readFile } from 'node:fs/promises';
import { errorMessage, isBusyError, isExecutionError, isValidationError } from '../../core/errors.js';
import type { PredictionBatch } from '../../core/types.js';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { parseCsv } from '../../ingestion/table.js';
import { formatBatchCsv } from '../../pipeline/export.js';
import { toBatchPayload } from '../../serving/types.js';
import { createChurnlineService, type ServiceSettings } from '../../service.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import {
  formatJson,
  formatTable,
  formatValidationError,
  printError,
  printOutput,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface RunCommandOptions {
  readonly demo?: boolean;
  readonly timeoutMs?: number;
  readonly out?: string;
  readonly json?: boolean;
  /** Rows shown in the text preview */
  readonly preview?: number;
}

const DEFAULT_PREVIEW_ROWS = 10;

export async function runCommand(
  file: string,
  settings: ServiceSettings,
  options: RunCommandOptions = {}
): Promise<ExitCode> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    printError(`Could not read ${file}: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }

  const service = createChurnlineService(settings);
  try {
    const report = await service.pipeline.run(parseCsv(content), {
      mode: options.demo ? 'demo' : 'model',
      timeoutMs: options.timeoutMs,
    });

    if (options.out !== undefined) {
      await atomicWriteFile(options.out, formatBatchCsv(report.batch));
    }

    if (options.json) {
      printOutput(
        formatJson({ ...toBatchPayload(report.batch), warnings: report.warnings, durationMs: report.durationMs })
      );
    } else {
      for (const warning of report.warnings) {
        printWarning(warning);
      }
      printOutput(describeBatch(report.batch, options.preview ?? DEFAULT_PREVIEW_ROWS));
    }

    if (options.out !== undefined) {
      printSuccess(`Wrote ${report.batch.summary.total} predictions to ${options.out}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (isValidationError(error)) {
      printError(formatValidationError(error));
    } else if (isExecutionError(error) || isBusyError(error)) {
      printError(error.message);
    } else {
      printError(errorMessage(error));
    }
    return EXIT_CODES.ERRORS;
  } finally {
    service.close();
  }
}

function describeBatch(batch: PredictionBatch, previewRows: number): string {
  const { summary } = batch;
  const sourceLine =
    batch.fallbackReason !== undefined
      ? `Source: simulated (scoring process failed: ${batch.fallbackReason})`
      : `Source: ${batch.source}`;

  const lines = [
    sourceLine,
    `Customers: ${summary.total}  High: ${summary.high}  Medium: ${summary.medium}  Low: ${summary.low}`,
    `Mean churn probability: ${summary.meanProbability.toFixed(4)}`,
    '',
    formatTable(
      batch.predictions.slice(0, previewRows).map((prediction) => ({
        id: prediction.id,
        probability: prediction.churnProbability,
        risk: prediction.riskLevel,
      })),
      [
        { key: 'id', header: 'customerID' },
        {
          key: 'probability',
          header: 'churn_probability',
          align: 'right',
          formatter: (value) => (typeof value === 'number' ? value.toFixed(4) : String(value)),
        },
        { key: 'risk', header: 'risk_level' },
      ]
    ),
  ];

  if (batch.predictions.length > previewRows) {
    lines.push(`... ${batch.predictions.length - previewRows} more`);
  }
  return lines.join('\n');
}
