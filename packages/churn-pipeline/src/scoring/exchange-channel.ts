/**
 * Exchange Channel
 *
 * Transport between the orchestrator and the external scoring process. A
 * session is opened per run and owned exclusively by that run; nothing else
 * writes to it.
 *
 * The file implementation gives each run a private temporary directory with
 * `customers.csv` (input, written atomically) and `predictions.csv` (output
 * expected from the process). Other transports (pipe, RPC) implement the
 * same interface.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CANONICAL_ID_COLUMN } from '../ingestion/columns.js';
import { formatCsv, parseCsv } from '../ingestion/table.js';
import type { RawTable, ValidatedTable } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

export interface ExchangeSession {
  /** Where the process reads its input (substituted for `{input}`) */
  readonly inputLocation: string;
  /** Where the process writes its result (substituted for `{output}`) */
  readonly outputLocation: string;
  writeInput(table: ValidatedTable): Promise<void>;
  /**
   * Parsed output, or null when the process produced no artifact.
   * Throws when the artifact exists but cannot be read.
   */
  readOutput(): Promise<RawTable | null>;
  dispose(): Promise<void>;
}

export interface ExchangeChannel {
  readonly kind: string;
  open(): Promise<ExchangeSession>;
}

export const INPUT_FILE_NAME = 'customers.csv';
export const OUTPUT_FILE_NAME = 'predictions.csv';

/**
 * Serialize a validated table back to the wire layout: the identifier column
 * first (under its canonical name), then features in input order.
 */
export function toExchangeTable(table: ValidatedTable): RawTable {
  const featureColumns = table.columns.filter((column) => column !== table.idColumn);
  return {
    columns: [CANONICAL_ID_COLUMN, ...featureColumns],
    rows: table.records.map((record) => [
      record.id,
      ...featureColumns.map((column) => (Object.hasOwn(record.features, column) ? record.features[column] : '')),
    ]),
  };
}

export class FileExchangeChannel implements ExchangeChannel {
  readonly kind = 'file';

  constructor(private readonly baseDir: string = tmpdir()) {}

  async open(): Promise<ExchangeSession> {
    const dir = await mkdtemp(join(this.baseDir, 'churnline-run-'));
    return new FileExchangeSession(dir);
  }
}

class FileExchangeSession implements ExchangeSession {
  readonly inputLocation: string;
  readonly outputLocation: string;

  constructor(private readonly dir: string) {
    this.inputLocation = join(dir, INPUT_FILE_NAME);
    this.outputLocation = join(dir, OUTPUT_FILE_NAME);
  }

  async writeInput(table: ValidatedTable): Promise<void> {
    await atomicWriteFile(this.inputLocation, formatCsv(toExchangeTable(table)));
  }

  async readOutput(): Promise<RawTable | null> {
    let content: string;
    try {
      content = await readFile(this.outputLocation, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
    return parseCsv(content);
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
