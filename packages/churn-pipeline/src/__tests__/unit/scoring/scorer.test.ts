/**
 * Scorer variant tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileExchangeChannel } from '../../../scoring/exchange-channel.js';
import { ExecutionOrchestrator } from '../../../scoring/orchestrator.js';
import { ModelScorer, SimulatedScorer } from '../../../scoring/scorer.js';
import { createFakeScorerWorkspace, type FakeScorerWorkspace } from '../../utils/fake-scorer.js';
import { validated } from '../../utils/fixtures.js';

describe('ModelScorer', () => {
  let scorers: FakeScorerWorkspace;
  let exchangeDir: string;

  beforeEach(async () => {
    scorers = await createFakeScorerWorkspace();
    exchangeDir = await mkdtemp(join(tmpdir(), 'churnline-scorer-test-'));
  });

  afterEach(async () => {
    await scorers.cleanup();
    await rm(exchangeDir, { recursive: true, force: true });
  });

  async function modelScorer(...args: Parameters<FakeScorerWorkspace['create']>): Promise<ModelScorer> {
    const config = await scorers.create(...args);
    return new ModelScorer(new ExecutionOrchestrator(config, new FileExchangeChannel(exchangeDir)));
  }

  it('turns a valid artifact into a model batch', async () => {
    const scorer = await modelScorer({ kind: 'score', probabilities: { A: 0.9, B: 0.5, C: 0.1 } });
    const onPhase = vi.fn();

    const outcome = await scorer.score(validated(), { onPhase });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.batch.source).toBe('model');
    expect(outcome.batch.predictions.map((p) => [p.id, p.churnProbability, p.riskLevel])).toEqual([
      ['A', 0.9, 'High'],
      ['B', 0.5, 'Medium'],
      ['C', 0.1, 'Low'],
    ]);
    expect(onPhase).toHaveBeenCalledWith('reading');
  });

  it('reports a rejected artifact as malformed output', async () => {
    const scorer = await modelScorer({ kind: 'write', content: 'customerID,churn_probability\nA,2\nB,0.1\nC,0.1\n' });

    const outcome = await scorer.score(validated());

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.reason).toBe('malformed-output');
    expect(outcome.detail).toMatch(/^Malformed scoring output at .*predictions\.csv: 1 row\(s\) have a probability/);
  });

  it('passes execution failures through', async () => {
    const scorer = await modelScorer({ kind: 'exit', code: 2 });
    const outcome = await scorer.score(validated());

    expect(outcome).toEqual({ ok: false, reason: 'crash', detail: 'Scoring process failed with exit code 2' });
  });

  it('does not read anything when the process fails', async () => {
    const scorer = await modelScorer({ kind: 'exit', code: 1 });
    const onPhase = vi.fn();

    await scorer.score(validated(), { onPhase });

    expect(onPhase).not.toHaveBeenCalled();
  });
});

describe('SimulatedScorer', () => {
  it('scores in process and carries the fallback reason', async () => {
    const scorer = new SimulatedScorer({ jitter: 0 });
    const outcome = await scorer.score(validated(), { fallbackReason: 'crash' });

    expect(scorer.kind).toBe('simulated');
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.batch.fallbackReason).toBe('crash');
    expect(outcome.batch.predictions.map((p) => p.churnProbability)).toEqual([0.9, 0.2, 0]);
  });
});
