/**
 * Service composition
 *
 * Wires the orchestrator, both scorers, the result store, the health monitor
 * and the pipeline from one settings object. The CLI and the HTTP API both
 * build their pipeline here.
 */

import { PredictionPipeline } from './pipeline/prediction-pipeline.js';
import { ResultStore } from './pipeline/result-store.js';
import { FileExchangeChannel, type ExchangeChannel } from './scoring/exchange-channel.js';
import { ExecutionOrchestrator, type ScorerProcessConfig } from './scoring/orchestrator.js';
import { ModelScorer, SimulatedScorer } from './scoring/scorer.js';
import { HealthMonitor } from './serving/health.js';

export interface ServiceSettings {
  readonly scorer: ScorerProcessConfig;
  readonly pipeline: { readonly fallbackEnabled: boolean };
  readonly simulator: { readonly seed: number; readonly jitter: number };
}

export interface ChurnlineService {
  readonly settings: ServiceSettings;
  readonly pipeline: PredictionPipeline;
  readonly store: ResultStore;
  readonly orchestrator: ExecutionOrchestrator;
  readonly health: HealthMonitor;
  /** Detach the health monitor from the store */
  close(): void;
}

export function createChurnlineService(
  settings: ServiceSettings,
  channel: ExchangeChannel = new FileExchangeChannel()
): ChurnlineService {
  const store = new ResultStore();
  const orchestrator = new ExecutionOrchestrator(settings.scorer, channel);
  const health = new HealthMonitor({ fallbackEnabled: settings.pipeline.fallbackEnabled });
  const unsubscribe = store.subscribe((batch) => health.updateBatch(batch));

  const pipeline = new PredictionPipeline(
    {
      modelScorer: new ModelScorer(orchestrator),
      simulatedScorer: new SimulatedScorer({
        seed: settings.simulator.seed,
        jitter: settings.simulator.jitter,
      }),
      store,
      recorder: health,
    },
    {
      fallbackEnabled: settings.pipeline.fallbackEnabled,
      defaultRetryAfterMs: settings.scorer.timeoutMs,
    }
  );

  return {
    settings,
    pipeline,
    store,
    orchestrator,
    health,
    close: unsubscribe,
  };
}
