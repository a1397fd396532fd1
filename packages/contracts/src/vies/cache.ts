import type { ViesErrorCode } from '../vat/result.js';

/**
 * The part of a VIES answer worth remembering between lookups.
 */
export interface CachedLookup {
  isValid: boolean;
  errorCode: ViesErrorCode;
  companyName?: string;
  companyAddress?: string;
  requestDate?: string;
}

/**
 * Options for storing a cache entry
 */
export interface ResultCacheOptions {
  /**
   * Time-to-live in milliseconds
   */
  ttlMs?: number;
}

/**
 * Cache statistics
 */
export interface ResultCacheStats {
  entries: number;
  hits: number;
  misses: number;
  expiredPending: number;
}

/**
 * ResultCache keeps definitive lookups keyed by full VAT number.
 */
export interface ResultCache {
  get(key: string): Promise<CachedLookup | undefined>;

  set(key: string, lookup: CachedLookup, options?: ResultCacheOptions): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;

  stats(): Promise<ResultCacheStats>;

  close(): Promise<void>;
}
