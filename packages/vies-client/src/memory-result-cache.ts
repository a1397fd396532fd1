import type {
  CachedLookup,
  ResultCache,
  ResultCacheOptions,
  ResultCacheStats,
} from '@vies-batch/contracts';
import { InvalidStateError } from '@vies-batch/shared';

/**
 * Default TTL: 1 hour
 */
const DEFAULT_TTL_MS = 3_600_000;

/**
 * Cleanup interval: 60 seconds
 */
const CLEANUP_INTERVAL_MS = 60_000;

interface CacheEntry {
  lookup: CachedLookup;
  expiresAt: number;
}

/**
 * MemoryResultCache keeps definitive VIES answers for the life of the process.
 *
 * Entries expire after their TTL; expired entries are dropped on read and by
 * a periodic sweep that does not keep the process alive.
 */
export class MemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private hits = 0;
  private misses = 0;
  private closed = false;

  constructor(options?: { ttlMs?: number; cleanupIntervalMs?: number; now?: () => number }) {
    this.defaultTtlMs = options?.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options?.now ?? Date.now;
    const interval = options?.cleanupIntervalMs ?? CLEANUP_INTERVAL_MS;
    if (interval > 0) {
      this.startCleanupTimer(interval);
    }
  }

  async get(key: string): Promise<CachedLookup | undefined> {
    this.checkClosed();

    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return { ...entry.lookup };
  }

  async set(key: string, lookup: CachedLookup, options?: ResultCacheOptions): Promise<void> {
    this.checkClosed();

    const ttlMs = options?.ttlMs ?? this.defaultTtlMs;
    if (ttlMs <= 0) return;

    this.entries.set(key, { lookup: { ...lookup }, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<boolean> {
    this.checkClosed();
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.checkClosed();
    this.entries.clear();
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  cleanup(): number {
    let cleaned = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        cleaned++;
      }
    }
    return cleaned;
  }

  async stats(): Promise<ResultCacheStats> {
    this.checkClosed();

    let expiredPending = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry)) expiredPending++;
    }

    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      expiredPending,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.entries.clear();
    this.closed = true;
  }

  get size(): number {
    return this.entries.size;
  }

  private startCleanupTimer(intervalMs: number): void {
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, intervalMs);

    // Don't block process exit
    this.cleanupTimer.unref();
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.expiresAt <= this.now();
  }

  private checkClosed(): void {
    if (this.closed) {
      throw new InvalidStateError('ResultCache is closed');
    }
  }
}
