/**
 * Execution Orchestrator
 *
 * Owns the hand-off to the external scoring process:
 * 1. opens a private exchange session and writes the validated table
 * 2. invokes the configured command with `{input}`/`{output}` substituted
 * 3. waits up to the timeout, killing and reaping the child past it
 * 4. reads the artifact back and returns a handle for the output reader
 *
 * CONCURRENCY: single flight. A run requested while another is in progress
 * is rejected with BusyError before the exchange channel is touched.
 *
 * Execution failures come back as `{ ok: false, reason }`; BusyError is the
 * only thing this class throws from `run`.
 */

import { BusyError, errorMessage } from '../core/errors.js';
import type { ExecutionFailureReason, ExecutionResult, RawTable, ValidatedTable } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { Bulkhead, BulkheadRejectionError } from '../resilience/bulkhead.js';
import { FileExchangeChannel, type ExchangeChannel, type ExchangeSession } from './exchange-channel.js';
import { expandArgs, runProcess, type ProcessOutcome } from './process-runner.js';

const log = createLogger({ module: 'orchestrator' });

export interface ScorerProcessConfig {
  /** Executable to run (e.g. `python3`) */
  readonly command: string;
  /** Arguments; `{input}` and `{output}` are replaced with session locations */
  readonly args: readonly string[];
  readonly cwd?: string;
  /** Default deadline for a whole run (write, execute, read) */
  readonly timeoutMs: number;
  readonly killGraceMs: number;
}

export interface RunOptions {
  /** Overrides the configured timeout for this run */
  readonly timeoutMs?: number;
  /** Caller cancellation; the child is killed and the gate released */
  readonly signal?: AbortSignal;
}

export const INPUT_ENV_VAR = 'CHURNLINE_INPUT';
export const OUTPUT_ENV_VAR = 'CHURNLINE_OUTPUT';

class DeadlineExceededError extends Error {
  constructor(stage: string) {
    super(`Deadline exceeded while ${stage}`);
    this.name = 'DeadlineExceededError';
  }
}

export class ExecutionOrchestrator {
  private readonly gate: Bulkhead;

  constructor(
    private readonly config: ScorerProcessConfig,
    private readonly channel: ExchangeChannel = new FileExchangeChannel()
  ) {
    this.gate = new Bulkhead({
      name: 'scoring-process',
      maxConcurrent: 1,
      defaultRetryAfterMs: config.timeoutMs,
    });
  }

  get isBusy(): boolean {
    return this.gate.isSaturated;
  }

  getGateStats(): ReturnType<Bulkhead['getStats']> {
    return this.gate.getStats();
  }

  /**
   * Run the scoring process on a validated table
   *
   * @throws BusyError when another run is in flight
   */
  async run(table: ValidatedTable, options: RunOptions = {}): Promise<ExecutionResult> {
    try {
      return await this.gate.execute(() => this.execute(table, options));
    } catch (error) {
      if (error instanceof BulkheadRejectionError) {
        throw new BusyError(error.retryAfterMs);
      }
      throw error;
    }
  }

  private async execute(table: ValidatedTable, options: RunOptions): Promise<ExecutionResult> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const startTime = Date.now();
    const remaining = (): number => Math.max(0, timeoutMs - (Date.now() - startTime));
    const fail = (reason: ExecutionFailureReason, detail: string): ExecutionResult => {
      log.warn('Scoring run failed', { reason, detail, records: table.records.length });
      return { ok: false, reason, detail, durationMs: Date.now() - startTime };
    };

    let session: ExchangeSession;
    try {
      session = await this.channel.open();
    } catch (error) {
      return fail('crash', `Could not open ${this.channel.kind} exchange channel: ${errorMessage(error)}`);
    }

    try {
      try {
        await withDeadline(session.writeInput(table), remaining(), 'writing input');
      } catch (error) {
        if (error instanceof DeadlineExceededError) return fail('timeout', error.message);
        return fail('crash', `Could not write scoring input: ${errorMessage(error)}`);
      }

      log.debug('Invoking scoring process', {
        command: this.config.command,
        records: table.records.length,
        timeoutMs,
      });

      const outcome = await runProcess(
        {
          command: this.config.command,
          args: expandArgs(this.config.args, {
            input: session.inputLocation,
            output: session.outputLocation,
          }),
          cwd: this.config.cwd,
          env: {
            [INPUT_ENV_VAR]: session.inputLocation,
            [OUTPUT_ENV_VAR]: session.outputLocation,
          },
        },
        { timeoutMs: remaining(), killGraceMs: this.config.killGraceMs, signal: options.signal }
      );

      const processFailure = describeProcessFailure(outcome, timeoutMs);
      if (processFailure) {
        return fail(processFailure.reason, processFailure.detail);
      }

      let output: RawTable | null;
      try {
        output = await withDeadline(session.readOutput(), remaining(), 'reading output');
      } catch (error) {
        if (error instanceof DeadlineExceededError) return fail('timeout', error.message);
        return fail('malformed-output', `Could not read scoring output: ${errorMessage(error)}`);
      }

      if (output === null) {
        return fail('missing-output', `Scoring process exited cleanly but wrote nothing to ${session.outputLocation}`);
      }
      if (output.columns.length === 0) {
        return fail('malformed-output', `Scoring output at ${session.outputLocation} is empty`);
      }

      const durationMs = Date.now() - startTime;
      log.info('Scoring process completed', { rows: output.rows.length, durationMs });
      return {
        ok: true,
        handle: { location: session.outputLocation, table: output, durationMs },
      };
    } finally {
      await session.dispose().catch((error: unknown) => {
        log.warn('Failed to dispose exchange session', {
          location: session.inputLocation,
          error: errorMessage(error),
        });
      });
    }
  }
}

function describeProcessFailure(
  outcome: ProcessOutcome,
  timeoutMs: number
): { reason: 'timeout' | 'crash'; detail: string } | null {
  switch (outcome.kind) {
    case 'timeout':
      return { reason: 'timeout', detail: `Scoring process exceeded ${timeoutMs}ms and was terminated` };
    case 'cancelled':
      return { reason: 'timeout', detail: 'cancelled' };
    case 'spawn-error':
      return { reason: 'crash', detail: `Could not start scoring process: ${outcome.message}` };
    case 'exited': {
      if (outcome.exitCode === 0) return null;
      const status =
        outcome.exitCode !== null ? `exit code ${outcome.exitCode}` : `signal ${outcome.exitSignal ?? 'unknown'}`;
      const stderr = outcome.stderr.trim();
      return {
        reason: 'crash',
        detail: stderr ? `Scoring process failed with ${status}: ${stderr}` : `Scoring process failed with ${status}`,
      };
    }
  }
}

async function withDeadline<T>(promise: Promise<T>, ms: number, stage: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(stage)), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
