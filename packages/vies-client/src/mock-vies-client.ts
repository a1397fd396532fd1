import {
  fullVatNumber,
  type VatQuery,
  type VatResult,
  type ViesClient,
  type ViesErrorCode,
} from '@vies-batch/contracts';
import { createVatResult, defaultClock, invalidInputResult, type Clock } from '@vies-batch/shared';
import { sleep } from './pacer.js';

/**
 * Canned answer for one full VAT number.
 */
export interface MockViesEntry {
  errorCode: ViesErrorCode;
  companyName?: string;
  companyAddress?: string;
}

export interface MockViesClientConfig {
  /** Answers keyed by full VAT number (e.g. `IT05159640266`) */
  entries?: Record<string, MockViesEntry>;

  /**
   * Answer for numbers not in `entries`. When unset, numbers whose last
   * digit is even are VALID and the rest INVALID.
   */
  fallback?: MockViesEntry;

  /** Artificial latency per lookup */
  latencyMs?: number;

  clock?: Clock;
}

/**
 * MockViesClient answers lookups in process without any network access.
 * Used by tests and by the CLI `--dry-run` flag.
 */
export class MockViesClient implements ViesClient {
  private readonly entries: Record<string, MockViesEntry>;
  private readonly fallback: MockViesEntry | undefined;
  private readonly latencyMs: number;
  private readonly clock: Clock;
  private readonly seen: VatQuery[] = [];
  private inFlight = 0;
  private peakInFlight = 0;
  private closed = false;

  constructor(config: MockViesClientConfig = {}) {
    this.entries = config.entries ?? {};
    this.fallback = config.fallback;
    this.latencyMs = config.latencyMs ?? 0;
    this.clock = config.clock ?? defaultClock;
  }

  async validate(query: VatQuery): Promise<VatResult> {
    if (query.countryCode === null) {
      return invalidInputResult(query, this.clock.now().toISOString());
    }

    this.seen.push(query);
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) {
        await sleep(this.latencyMs);
      }
      if (this.closed) {
        return createVatResult(query, {
          isValid: null,
          errorCode: 'SERVICE_UNAVAILABLE',
          message: 'VIES client is closed',
          requestTimestamp: this.clock.now().toISOString(),
          attempts: 0,
        });
      }

      const entry = this.entries[fullVatNumber(query)] ?? this.fallback ?? this.parityEntry(query.number);
      return createVatResult(query, {
        isValid: entry.errorCode === 'VALID' ? true : entry.errorCode === 'INVALID' ? false : null,
        errorCode: entry.errorCode,
        companyName: entry.companyName,
        companyAddress: entry.companyAddress,
        requestTimestamp: this.clock.now().toISOString(),
        attempts: 1,
      });
    } finally {
      this.inFlight--;
    }
  }

  /**
   * Queries that reached the client with a recognized country, in call order.
   */
  get calls(): readonly VatQuery[] {
    return this.seen;
  }

  /**
   * Highest number of concurrent lookups observed.
   */
  get maxConcurrency(): number {
    return this.peakInFlight;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  private parityEntry(number: string): MockViesEntry {
    const lastDigit = Number(number.slice(-1));
    return Number.isInteger(lastDigit) && lastDigit % 2 === 0
      ? { errorCode: 'VALID', companyName: `Mock Trader ${number}`, companyAddress: 'Mock Street 1' }
      : { errorCode: 'INVALID' };
  }
}
