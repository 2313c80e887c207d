/**
 * Process runner tests
 *
 * Children are short inline scripts run by the current Node binary.
 */

import { describe, it, expect } from 'vitest';
import { expandArgs, runProcess, type ProcessSpec } from '../../../scoring/process-runner.js';

function node(script: string, env?: Record<string, string>): ProcessSpec {
  return { command: process.execPath, args: ['-e', script], env };
}

describe('runProcess', () => {
  it('reports a clean exit', async () => {
    const outcome = await runProcess(node('process.exitCode = 0'), { timeoutMs: 10_000 });
    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 0, exitSignal: null, stderr: '' });
  });

  it('reports a non-zero exit with the stderr tail', async () => {
    const outcome = await runProcess(node("process.stderr.write('boom'); process.exitCode = 3"), {
      timeoutMs: 10_000,
    });
    expect(outcome).toMatchObject({ kind: 'exited', exitCode: 3, stderr: 'boom' });
  });

  it('passes extra environment variables', async () => {
    const outcome = await runProcess(node('process.stderr.write(process.env.CHURNLINE_TEST_VALUE ?? "")', {
      CHURNLINE_TEST_VALUE: 'from-parent',
    }), { timeoutMs: 10_000 });
    expect(outcome).toMatchObject({ kind: 'exited', stderr: 'from-parent' });
  });

  it('terminates a child that runs past the deadline', async () => {
    const outcome = await runProcess(node('setInterval(() => {}, 1000)'), { timeoutMs: 200, killGraceMs: 200 });
    expect(outcome.kind).toBe('timeout');
    expect(outcome.durationMs).toBeGreaterThanOrEqual(150);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const outcome = await runProcess(
      node("process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"),
      { timeoutMs: 300, killGraceMs: 200 }
    );
    expect(outcome.kind).toBe('timeout');
    expect(outcome.durationMs).toBeGreaterThanOrEqual(450);
  });

  it('kills the child when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = runProcess(node('setInterval(() => {}, 1000)'), {
      timeoutMs: 10_000,
      killGraceMs: 200,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);

    const outcome = await pending;
    expect(outcome.kind).toBe('cancelled');
    expect(outcome.durationMs).toBeLessThan(5_000);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await runProcess(node('process.exitCode = 0'), {
      timeoutMs: 10_000,
      signal: controller.signal,
    });
    expect(outcome).toEqual({ kind: 'cancelled', stderr: '', durationMs: 0 });
  });

  it('reports a command that cannot be started', async () => {
    const outcome = await runProcess(
      { command: '/nonexistent/churnline-scorer', args: [] },
      { timeoutMs: 10_000 }
    );
    expect(outcome.kind).toBe('spawn-error');
  });
});

describe('expandArgs', () => {
  it('substitutes every placeholder occurrence', () => {
    expect(
      expandArgs(['score.py', '--input', '{input}', '--output={output}', '{input}:{output}'], {
        input: '/tmp/in.csv',
        output: '/tmp/out.csv',
      })
    ).toEqual(['score.py', '--input', '/tmp/in.csv', '--output=/tmp/out.csv', '/tmp/in.csv:/tmp/out.csv']);
  });
});
