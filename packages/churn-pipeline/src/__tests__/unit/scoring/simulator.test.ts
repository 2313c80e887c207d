/**
 * Fallback simulator tests
 */

import { describe, it, expect } from 'vitest';
import { heuristicScore, mulberry32, simulate } from '../../../scoring/simulator.js';
import { customerTable, validated } from '../../utils/fixtures.js';

describe('simulate', () => {
  it('scores the three reference customers without jitter', () => {
    const batch = simulate(validated(), { jitter: 0 });

    expect(batch.source).toBe('simulated');
    expect(batch.predictions).toEqual([
      { id: 'A', churnProbability: 0.9, riskLevel: 'High' },
      { id: 'B', churnProbability: 0.2, riskLevel: 'Low' },
      { id: 'C', churnProbability: 0, riskLevel: 'Low' },
    ]);
    expect(batch.summary).toEqual({ total: 3, low: 2, medium: 0, high: 1, meanProbability: 0.3667 });
    expect(batch.fallbackReason).toBeUndefined();
  });

  it('keeps input order and covers every id exactly once', () => {
    const batch = simulate(validated());
    expect(batch.predictions.map((p) => p.id)).toEqual(['A', 'B', 'C']);
  });

  it('is deterministic for a seed', () => {
    const table = validated();
    const first = simulate(table, { seed: 7 });
    const second = simulate(table, { seed: 7 });
    expect(first.predictions).toEqual(second.predictions);
  });

  it('keeps jittered scores within half-width of the heuristic and inside [0, 1]', () => {
    const table = validated();
    const batch = simulate(table, { seed: 11, jitter: 0.05 });

    batch.predictions.forEach((prediction, index) => {
      const record = table.records[index];
      if (!record) throw new Error('record missing');
      const base = Math.min(1, Math.max(0, heuristicScore(record)));
      expect(prediction.churnProbability).toBeGreaterThanOrEqual(0);
      expect(prediction.churnProbability).toBeLessThanOrEqual(1);
      expect(Math.abs(prediction.churnProbability - base)).toBeLessThanOrEqual(0.05 + 1e-4);
    });
  });

  it('records the fallback reason when replacing a failed run', () => {
    const batch = simulate(validated(), { fallbackReason: 'timeout' });
    expect(batch.fallbackReason).toBe('timeout');
  });

  it('ignores absent and unparseable features', () => {
    const table = validated({
      columns: ['customerID', 'tenure', 'Contract'],
      rows: [
        ['X', 'unknown', ''],
        ['Y', '', 'Two year'],
      ],
    });
    const batch = simulate(table, { jitter: 0 });
    expect(batch.predictions.map((p) => p.churnProbability)).toEqual([0.25, 0.1]);
  });

  it('matches feature columns regardless of case and separators', () => {
    const table = validated({
      columns: ['customerID', 'Tenure', 'monthly_charges', 'contract'],
      rows: [['A', '2', '95', 'month-to-month']],
    });
    expect(simulate(table, { jitter: 0 }).predictions[0]?.churnProbability).toBe(0.9);
  });

  it('uses the fixture table unchanged', () => {
    const raw = customerTable();
    simulate(validated(raw));
    expect(raw.rows[0]).toEqual(['A', '2', '95', 'Month-to-month']);
  });
});

describe('mulberry32', () => {
  it('yields the same sequence for the same seed in [0, 1)', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 100; i++) {
      const value = a();
      expect(value).toBe(b());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
