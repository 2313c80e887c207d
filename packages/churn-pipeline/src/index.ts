/**
 * @churnline/pipeline
 *
 * Churn prediction pipeline: validate a customer table, score it with an
 * external process (or simulate when that fails), cache the batch, serve it.
 */

export * from './core/types.js';
export * from './core/errors.js';
export {
  RISK_THRESHOLDS,
  buildBatch,
  classifyRisk,
  summarize,
} from './core/batch.js';
export { createLogger, logger, setLogLevel, type LogLevel } from './core/utils/logger.js';

export { parseCsv, formatCsv, tableFromObjects } from './ingestion/table.js';
export { validateTable, type ValidationOutcome } from './ingestion/validator.js';
export { generateSampleTable } from './ingestion/sample.js';

export { ExecutionOrchestrator, type ScorerProcessConfig, type RunOptions } from './scoring/orchestrator.js';
export { FileExchangeChannel, type ExchangeChannel, type ExchangeSession } from './scoring/exchange-channel.js';
export { readOutput } from './scoring/output-reader.js';
export { simulate, type SimulatorOptions } from './scoring/simulator.js';
export { ModelScorer, SimulatedScorer, type Scorer, type ScoreOutcome } from './scoring/scorer.js';
export { checkScorerAvailability, type ScorerAvailability } from './scoring/availability.js';

export {
  PredictionPipeline,
  type PipelineRunOptions,
  type RunMode,
  type RunReport,
  type RunState,
} from './pipeline/prediction-pipeline.js';
export { ResultStore } from './pipeline/result-store.js';
export { DOWNLOAD_COLUMNS, batchToTable, formatBatchCsv } from './pipeline/export.js';

export { createChurnlineService, type ChurnlineService, type ServiceSettings } from './service.js';
export { ChurnlineAPI, createChurnlineAPI, type ChurnlineAPIOptions } from './serving/api.js';
export { HealthMonitor } from './serving/health.js';

export { loadConfig, ConfigError, DEFAULT_CONFIG, type ChurnlineConfig } from './cli/lib/config.js';
