/**
 * @vies-batch/batch
 *
 * Batch validation of VAT numbers: job state, the bounded worker pool,
 * progress events and result summaries.
 *
 * @packageDocumentation
 */

// Job
export { BatchJob, type BatchJobInit } from './job/batch-job.js';
export { ResultStore } from './job/result-store.js';

// Orchestrator
export {
  BatchOrchestrator,
  queriesFromRows,
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  type BatchOrchestratorConfig,
  type BatchRunOptions,
  type BatchRun,
} from './orchestrator/orchestrator.js';
export { ProgressChannel } from './orchestrator/progress-channel.js';

// Events
export {
  CompositeEventHooks,
  NoopEventHooks,
  ConsoleEventHooks,
  type BatchEventHooks,
  type BatchStartEvent,
  type QueryDispatchedEvent,
  type QueryResultEvent,
  type BatchProgressEvent,
  type BatchCompleteEvent,
} from './events/hooks.js';

// Reporting
export { summarizeBatch, searchResults, type BatchSummary } from './report/summary.js';
