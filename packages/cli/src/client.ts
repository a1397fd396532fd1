import type { LogSink, ViesClient } from '@vies-batch/contracts';
import type { AppConfig, Logger } from '@vies-batch/shared';
import { HttpViesClient, MemoryResultCache, MockViesClient } from '@vies-batch/vies-client';

/**
 * A client plus whatever must be released with it.
 */
export interface ClientHandle {
  readonly client: ViesClient;
  close(): Promise<void>;
}

export interface OpenClientOptions {
  /** Answer from the in-process mock instead of VIES */
  dryRun: boolean;
  logSink: LogSink;
}

export function openViesClient(config: AppConfig, options: OpenClientOptions, logger: Logger): ClientHandle {
  if (options.dryRun) {
    const mock = new MockViesClient({ latencyMs: 20 });
    return { client: mock, close: () => mock.close() };
  }

  const cache = new MemoryResultCache({ ttlMs: config.cacheTtlMs });
  const client = new HttpViesClient({
    baseUrl: config.viesBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    retryDelayMs: config.retryDelayMs,
    minRequestIntervalMs: config.requestIntervalMs,
    cache,
    cacheTtlMs: config.cacheTtlMs,
    logSink: options.logSink,
    logger: logger.child({ component: 'vies-client' }),
  });
  return {
    client,
    close: async () => {
      await client.close();
      await cache.close();
    },
  };
}
