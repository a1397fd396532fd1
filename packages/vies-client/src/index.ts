/**
 * @vies-batch/vies-client
 *
 * Client for the EU VIES REST lookup service.
 *
 * Features:
 * - Per-attempt timeout and one retry after a fixed backoff
 * - Explicit normalization of the aliased response fields
 * - Live request/response log through a pluggable sink
 * - Optional cache of definitive answers and request pacing
 *
 * @packageDocumentation
 */

export {
  HttpViesClient,
  DEFAULT_VIES_BASE_URL,
  RETRYABLE_STATUSES,
  type HttpViesClientConfig,
} from './vies-client.js';
export {
  createDefaultHttpClient,
  isAbortError,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse,
} from './http-client.js';
export {
  parseViesBody,
  normalizeViesPayload,
  presentText,
  type ViesAnswer,
  type ViesParseOutcome,
  type ViesPayload,
} from './response.js';
export { MemoryResultCache } from './memory-result-cache.js';
export {
  MemoryLogSink,
  LoggerLogSink,
  CompositeLogSink,
  noopLogSink,
  formatLogLine,
} from './log-sinks.js';
export { RequestPacer, sleep } from './pacer.js';
export { MockViesClient, type MockViesClientConfig, type MockViesEntry } from './mock-vies-client.js';
