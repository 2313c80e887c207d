/**
 * Health Monitoring Service
 *
 * Tracks pipeline metrics for observability:
 * - Run counts by source (model, simulated, fallback)
 * - Run duration (p50, p95, p99)
 * - Scoring process failures and rejected runs
 * - Scorer availability and current batch freshness
 *
 * Receives run outcomes as the pipeline's RunRecorder. Prometheus-compatible
 * metrics export.
 */

import type { ExecutionFailureReason, PredictionBatch, PredictionSource } from '../core/types.js';
import type { RunRecorder } from '../pipeline/prediction-pipeline.js';
import type { ScorerAvailability } from '../scoring/availability.js';
import type { CurrentBatchMetrics, FailureSample, HealthMetrics, HealthStatus, RunMetrics } from './types.js';

const MAX_DURATION_SAMPLES = 1000;
const MAX_FAILURE_SAMPLES = 100;

export interface HealthMonitorOptions {
  readonly fallbackEnabled: boolean;
}

export class HealthMonitor implements RunRecorder {
  private startTime: number;
  private runCount = 0;
  private modelCount = 0;
  private simulatedCount = 0;
  private fallbackCount = 0;
  private failedCount = 0;
  private rejectedCount = 0;
  private durations: number[] = [];
  private failures: FailureSample[] = [];
  private scorer: ScorerAvailability | null = null;
  private batch: PredictionBatch | null = null;

  private readonly FAILURE_WINDOW_5M = 5 * 60 * 1000;
  private readonly FAILURE_WINDOW_1H = 60 * 60 * 1000;
  private readonly FAILURE_WINDOW_24H = 24 * 60 * 60 * 1000;

  constructor(private readonly options: HealthMonitorOptions) {
    this.startTime = Date.now();
  }

  recordRun(source: PredictionSource, durationMs: number, fallbackReason?: ExecutionFailureReason): void {
    this.runCount++;
    if (source === 'model') {
      this.modelCount++;
    } else {
      this.simulatedCount++;
    }
    if (fallbackReason !== undefined) {
      this.fallbackCount++;
    }

    this.durations.push(durationMs);
    if (this.durations.length > MAX_DURATION_SAMPLES) {
      this.durations.shift();
    }
  }

  recordFailure(reason: ExecutionFailureReason, detail: string): void {
    this.failedCount++;
    this.failures.push({ timestamp: Date.now(), reason, detail });
    if (this.failures.length > MAX_FAILURE_SAMPLES) {
      this.failures.shift();
    }
  }

  recordRejected(): void {
    this.rejectedCount++;
  }

  updateScorerAvailability(availability: ScorerAvailability): void {
    this.scorer = availability;
  }

  /**
   * Track the store's current batch (wired to ResultStore.subscribe)
   */
  updateBatch(batch: PredictionBatch | null): void {
    this.batch = batch;
  }

  getMetrics(): HealthMetrics {
    const now = Date.now();

    const runs: RunMetrics = {
      total: this.runCount,
      model: this.modelCount,
      simulated: this.simulatedCount,
      fallbacks: this.fallbackCount,
      failed: this.failedCount,
      rejected: this.rejectedCount,
      durationP50: this.calculatePercentile(0.5),
      durationP95: this.calculatePercentile(0.95),
      durationP99: this.calculatePercentile(0.99),
      lastFailure: this.failures[this.failures.length - 1] ?? null,
    };

    const currentBatch: CurrentBatchMetrics | null = this.batch
      ? {
          batchId: this.batch.batchId,
          version: this.batch.version,
          source: this.batch.source,
          records: this.batch.summary.total,
          createdAt: this.batch.createdAt,
          ageSeconds: Math.max(0, (now - Date.parse(this.batch.createdAt)) / 1000),
        }
      : null;

    const failures = {
      last5m: this.countFailuresInWindow(this.FAILURE_WINDOW_5M),
      last1h: this.countFailuresInWindow(this.FAILURE_WINDOW_1H),
      last24h: this.countFailuresInWindow(this.FAILURE_WINDOW_24H),
    };

    return {
      status: this.determineHealthStatus(failures.last5m),
      uptime: (now - this.startTime) / 1000,
      scorer: this.scorer,
      fallbackEnabled: this.options.fallbackEnabled,
      currentBatch,
      runs,
      failures,
      timestamp: now,
    };
  }

  private calculatePercentile(p: number): number {
    if (this.durations.length === 0) {
      return 0;
    }

    const sorted = [...this.durations].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  }

  private countFailuresInWindow(windowMs: number): number {
    const cutoff = Date.now() - windowMs;
    return this.failures.filter((failure) => failure.timestamp >= cutoff).length;
  }

  /**
   * Unhealthy: no working scorer and nothing to fall back to.
   * Degraded: predictions are (or recently were) simulated.
   */
  private determineHealthStatus(recentFailures: number): HealthStatus {
    const scorerDown = this.scorer !== null && !this.scorer.available;

    if (scorerDown && !this.options.fallbackEnabled) {
      return 'unhealthy';
    }
    if (scorerDown || recentFailures > 0) {
      return 'degraded';
    }
    return 'healthy';
  }

  exportPrometheus(): string {
    const metrics = this.getMetrics();
    const lines: string[] = [];

    lines.push('# HELP churnline_runs_total Completed prediction runs by source');
    lines.push('# TYPE churnline_runs_total counter');
    lines.push(`churnline_runs_total{source="model"} ${metrics.runs.model}`);
    lines.push(`churnline_runs_total{source="simulated"} ${metrics.runs.simulated}`);

    lines.push('# HELP churnline_fallbacks_total Simulated runs that replaced a failed model run');
    lines.push('# TYPE churnline_fallbacks_total counter');
    lines.push(`churnline_fallbacks_total ${metrics.runs.fallbacks}`);

    lines.push('# HELP churnline_scorer_failures_total Failed scoring process executions');
    lines.push('# TYPE churnline_scorer_failures_total counter');
    lines.push(`churnline_scorer_failures_total ${metrics.runs.failed}`);

    lines.push('# HELP churnline_runs_rejected_total Runs rejected while another was in flight');
    lines.push('# TYPE churnline_runs_rejected_total counter');
    lines.push(`churnline_runs_rejected_total ${metrics.runs.rejected}`);

    lines.push('# HELP churnline_run_duration_seconds Run duration percentiles');
    lines.push('# TYPE churnline_run_duration_seconds summary');
    lines.push(`churnline_run_duration_seconds{quantile="0.5"} ${metrics.runs.durationP50 / 1000}`);
    lines.push(`churnline_run_duration_seconds{quantile="0.95"} ${metrics.runs.durationP95 / 1000}`);
    lines.push(`churnline_run_duration_seconds{quantile="0.99"} ${metrics.runs.durationP99 / 1000}`);

    lines.push('# HELP churnline_current_batch_records Records in the current batch');
    lines.push('# TYPE churnline_current_batch_records gauge');
    lines.push(`churnline_current_batch_records ${metrics.currentBatch?.records ?? 0}`);

    // 0=unhealthy, 1=degraded, 2=healthy
    lines.push('# HELP churnline_health Health status');
    lines.push('# TYPE churnline_health gauge');
    const healthValue = metrics.status === 'healthy' ? 2 : metrics.status === 'degraded' ? 1 : 0;
    lines.push(`churnline_health ${healthValue}`);

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (for testing)
   */
  reset(): void {
    this.startTime = Date.now();
    this.runCount = 0;
    this.modelCount = 0;
    this.simulatedCount = 0;
    this.fallbackCount = 0;
    this.failedCount = 0;
    this.rejectedCount = 0;
    this.durations = [];
    this.failures = [];
  }
}
