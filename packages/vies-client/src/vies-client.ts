import {
  fullVatNumber,
  isDefinitiveCode,
  type CachedLookup,
  type LiveLogEntry,
  type LogSink,
  type ResultCache,
  type VatQuery,
  type VatResult,
  type ViesClient,
  type ViesErrorCode,
} from '@vies-batch/contracts';
import {
  createVatResult,
  defaultClock,
  errorMessage,
  invalidInputResult,
  NetworkError,
  noopLogger,
  ServiceError,
  TimeoutError,
  toVatQuery,
  type Clock,
  type Logger,
} from '@vies-batch/shared';
import { createDefaultHttpClient, isAbortError, type HttpClient } from './http-client.js';
import { noopLogSink } from './log-sinks.js';
import { RequestPacer, sleep } from './pacer.js';
import { parseViesBody, type ViesAnswer } from './response.js';

export const DEFAULT_VIES_BASE_URL = 'https://ec.europa.eu/taxation_customs/vies/rest-api';

/**
 * HTTP statuses worth one more attempt (throttling and gateway errors)
 */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 503, 504]);

/**
 * Configuration for {@link HttpViesClient}
 */
export interface HttpViesClientConfig {
  /**
   * Service root; requests go to `{baseUrl}/ms/{country}/vat/{number}`
   * @default DEFAULT_VIES_BASE_URL
   */
  baseUrl?: string;

  /**
   * Per-attempt timeout
   * @default 15000
   */
  timeoutMs?: number;

  /**
   * Retries after a network error, timeout or retryable status
   * @default 1
   */
  retries?: number;

  /**
   * Fixed pause before a retry
   * @default 500
   */
  retryDelayMs?: number;

  /**
   * Minimum spacing between request starts
   * @default 0
   */
  minRequestIntervalMs?: number;

  /**
   * Definitive answers are stored here and served without a request
   */
  cache?: ResultCache;

  /**
   * TTL for cache entries; the cache's own default when unset
   */
  cacheTtlMs?: number;

  /**
   * Receives the live request/response log
   */
  logSink?: LogSink;

  /**
   * Longest response body copied into the live log
   * @default 500
   */
  maxLoggedBodyLength?: number;

  httpClient?: HttpClient;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Outcome of one HTTP attempt.
 */
type AttemptFailure = {
  kind: 'failure';
  errorCode: ViesErrorCode;
  error: NetworkError | TimeoutError | ServiceError;
  retryable: boolean;
};

type AttemptOutcome = { kind: 'answer'; answer: ViesAnswer } | AttemptFailure;

/**
 * VIES client over the public REST API.
 *
 * `validate` never rejects: transport and service failures come back as a
 * VatResult carrying the matching error code.
 *
 * @example
 * ```typescript
 * const client = new HttpViesClient({ timeoutMs: 10_000 });
 * const result = await client.validateNumber('IT', '05159640266');
 * console.log(result.errorCode, result.companyName);
 * ```
 */
export class HttpViesClient implements ViesClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly maxLoggedBodyLength: number;
  private readonly cacheTtlMs: number | undefined;
  private readonly cache: ResultCache | undefined;
  private readonly httpClient: HttpClient;
  private readonly logSink: LogSink;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pacer: RequestPacer;
  private closed = false;

  constructor(config: HttpViesClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_VIES_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.maxAttempts = Math.max(0, config.retries ?? 1) + 1;
    this.retryDelayMs = config.retryDelayMs ?? 500;
    this.maxLoggedBodyLength = config.maxLoggedBodyLength ?? 500;
    this.cacheTtlMs = config.cacheTtlMs;
    this.cache = config.cache;
    this.httpClient = config.httpClient ?? createDefaultHttpClient();
    this.logSink = config.logSink ?? noopLogSink;
    this.logger = config.logger ?? noopLogger;
    this.clock = config.clock ?? defaultClock;
    this.pacer = new RequestPacer(config.minRequestIntervalMs ?? 0);
  }

  /**
   * Request URL for a country and number.
   */
  buildUrl(countryCode: string, number: string): string {
    return `${this.baseUrl}/ms/${encodeURIComponent(countryCode)}/vat/${encodeURIComponent(number)}`;
  }

  /**
   * Validate a raw VAT number typed by a user (single lookup).
   */
  async validateRaw(raw: string): Promise<VatResult> {
    return this.validate(toVatQuery(raw, 0));
  }

  /**
   * Validate an already split country code and number.
   */
  async validateNumber(countryCode: string, number: string): Promise<VatResult> {
    return this.validate(toVatQuery(`${countryCode}${number}`, 0));
  }

  async validate(query: VatQuery): Promise<VatResult> {
    if (query.countryCode === null) {
      return invalidInputResult(query, this.timestamp());
    }
    if (this.closed) {
      return this.failureResult(query, 'SERVICE_UNAVAILABLE', 'VIES client is closed', 0);
    }

    const key = fullVatNumber(query);
    const cached = await this.readCache(key);
    if (cached) {
      this.log({ kind: 'info', message: `Cache hit for ${key}` });
      return createVatResult(query, {
        ...cached,
        requestTimestamp: this.timestamp(),
        attempts: 0,
        fromCache: true,
      });
    }

    const url = this.buildUrl(query.countryCode, query.number);
    let attempt = 1;
    await this.pacer.wait();
    let outcome = await this.attempt(url, attempt);

    while (outcome.kind === 'failure' && outcome.retryable && attempt < this.maxAttempts) {
      this.log({ kind: 'info', message: `Retrying ${key} in ${String(this.retryDelayMs)}ms`, url });
      await sleep(this.retryDelayMs);
      attempt++;
      await this.pacer.wait();
      outcome = await this.attempt(url, attempt);
    }

    if (outcome.kind === 'failure') {
      this.logger.warn('VIES lookup failed', {
        vat: key,
        errorCode: outcome.errorCode,
        attempts: attempt,
        error: outcome.error.message,
      });
      return this.failureResult(query, outcome.errorCode, outcome.error.message, attempt);
    }

    const { answer } = outcome;
    if (isDefinitiveCode(answer.errorCode) && answer.isValid !== null) {
      await this.writeCache(key, { ...answer, isValid: answer.isValid });
    }

    return createVatResult(query, {
      isValid: answer.isValid,
      errorCode: answer.errorCode,
      companyName: answer.companyName,
      companyAddress: answer.companyAddress,
      requestDate: answer.requestDate,
      message: answer.userError !== undefined ? `VIES reported ${answer.userError}` : undefined,
      requestTimestamp: this.timestamp(),
      attempts: attempt,
    });
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  private async attempt(url: string, attempt: number): Promise<AttemptOutcome> {
    this.log({
      kind: 'request',
      message: `GET ${url} (attempt ${String(attempt)}/${String(this.maxAttempts)})`,
      url,
      attempt,
      maxAttempts: this.maxAttempts,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let status: number;
    let statusText: string;
    let body: string;
    try {
      const response = await this.httpClient.get(url, {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      status = response.status;
      statusText = response.statusText;
      body = await response.text();
    } catch (error) {
      const failure: AttemptFailure =
        controller.signal.aborted || isAbortError(error)
          ? {
              kind: 'failure',
              errorCode: 'TIMEOUT',
              error: new TimeoutError(`Request timed out after ${String(this.timeoutMs)}ms`, this.timeoutMs, { url }),
              retryable: true,
            }
          : {
              kind: 'failure',
              errorCode: 'SERVICE_UNAVAILABLE',
              error: new NetworkError(`Network error: ${errorMessage(error)}`, url, { cause: error }),
              retryable: true,
            };
      this.log({ kind: 'error', message: failure.error.message, url, attempt });
      return failure;
    } finally {
      clearTimeout(timeoutId);
    }

    this.log({
      kind: 'response',
      message: `HTTP ${String(status)} ${statusText}`.trimEnd(),
      url,
      attempt,
      status,
      body: this.truncate(body),
    });

    if (status !== 200) {
      return {
        kind: 'failure',
        errorCode: 'SERVICE_UNAVAILABLE',
        error: new ServiceError(`HTTP ${String(status)} ${statusText}`.trimEnd(), 'HTTP_ERROR', status),
        retryable: RETRYABLE_STATUSES.has(status),
      };
    }

    const parsed = parseViesBody(body);
    if (!parsed.ok) {
      return {
        kind: 'failure',
        errorCode: 'SERVICE_UNAVAILABLE',
        error: new ServiceError(parsed.reason, 'MALFORMED_RESPONSE', status),
        retryable: false,
      };
    }

    return { kind: 'answer', answer: parsed.answer };
  }

  private failureResult(query: VatQuery, errorCode: ViesErrorCode, message: string, attempts: number): VatResult {
    return createVatResult(query, {
      isValid: null,
      errorCode,
      message,
      requestTimestamp: this.timestamp(),
      attempts,
    });
  }

  private async readCache(key: string): Promise<CachedLookup | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger.warn('Result cache read failed', { vat: key, error: errorMessage(error) });
      return undefined;
    }
  }

  private async writeCache(key: string, lookup: CachedLookup): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, lookup, this.cacheTtlMs !== undefined ? { ttlMs: this.cacheTtlMs } : undefined);
    } catch (error) {
      this.logger.warn('Result cache write failed', { vat: key, error: errorMessage(error) });
    }
  }

  private log(entry: Omit<LiveLogEntry, 'timestamp'>): void {
    try {
      this.logSink.write({ ...entry, timestamp: this.timestamp() });
    } catch (error) {
      this.logger.warn('Live log sink failed', { error: errorMessage(error) });
    }
  }

  private truncate(body: string): string {
    return body.length > this.maxLoggedBodyLength
      ? `${body.slice(0, this.maxLoggedBodyLength)}...`
      : body;
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }
}
