/**
 * External process invocation with a hard deadline
 *
 * Spawns the scoring command and resolves once the child has been reaped.
 * On timeout or cancellation the child gets SIGTERM, then SIGKILL after the
 * grace period; the promise still waits for `close` so no zombie or open
 * pipe outlives the run.
 */

import { spawn } from 'node:child_process';

export interface ProcessSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string>>;
}

export interface RunProcessOptions {
  readonly timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL */
  readonly killGraceMs?: number;
  readonly signal?: AbortSignal;
}

export type ProcessOutcome =
  | {
      readonly kind: 'exited';
      readonly exitCode: number | null;
      readonly exitSignal: NodeJS.Signals | null;
      readonly stderr: string;
      readonly durationMs: number;
    }
  | { readonly kind: 'timeout'; readonly stderr: string; readonly durationMs: number }
  | { readonly kind: 'cancelled'; readonly stderr: string; readonly durationMs: number }
  | { readonly kind: 'spawn-error'; readonly message: string; readonly durationMs: number };

/** Only the tail of stderr is kept for failure details */
export const STDERR_TAIL_BYTES = 4096;
export const DEFAULT_KILL_GRACE_MS = 2000;

export function runProcess(spec: ProcessSpec, options: RunProcessOptions): Promise<ProcessOutcome> {
  const startTime = Date.now();
  const elapsed = (): number => Date.now() - startTime;

  return new Promise<ProcessOutcome>((resolve) => {
    if (options.signal?.aborted) {
      resolve({ kind: 'cancelled', stderr: '', durationMs: 0 });
      return;
    }

    const child = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderr = '';
    let terminatedBy: 'timeout' | 'cancelled' | null = null;
    let killTimer: ReturnType<typeof setTimeout> | null = null;

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });

    const terminate = (cause: 'timeout' | 'cancelled'): void => {
      if (terminatedBy !== null || child.exitCode !== null) return;
      terminatedBy = cause;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    };

    const deadline = setTimeout(() => terminate('timeout'), options.timeoutMs);
    const onAbort = (): void => terminate('cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let settled = false;
    const finish = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    child.on('error', (error) => {
      // No pid: the command never started, and 'close' may not follow
      if (child.pid === undefined) {
        finish({ kind: 'spawn-error', message: error.message, durationMs: elapsed() });
      }
    });

    // 'close' fires after 'exit' once stdio is drained
    child.on('close', (exitCode, exitSignal) => {
      const durationMs = elapsed();
      if (terminatedBy !== null) {
        finish({ kind: terminatedBy, stderr, durationMs });
      } else {
        finish({ kind: 'exited', exitCode, exitSignal, stderr, durationMs });
      }
    });
  });
}

/**
 * Substitute `{input}` and `{output}` placeholders in command arguments
 */
export function expandArgs(
  args: readonly string[],
  locations: { readonly input: string; readonly output: string }
): string[] {
  return args.map((arg) => arg.replaceAll('{input}', locations.input).replaceAll('{output}', locations.output));
}
