import {
  buildEffectiveConfig,
  ConfigurationError,
  isLogLevel,
  type AppConfig,
  type LogLevel,
} from '@vies-batch/shared';

/**
 * Settings that can be given as command-line flags.
 */
export interface ConfigFlags {
  baseUrl?: string | undefined;
  timeout?: number | undefined;
  concurrency?: number | undefined;
  batchTimeout?: number | undefined;
  logLevel?: string | undefined;
}

/**
 * Defaults, then environment, then flags.
 *
 * @throws ConfigurationError for an unknown log level or an out-of-range value
 */
export function resolveConfig(
  flags: ConfigFlags,
  env: Readonly<Record<string, string | undefined>> = process.env,
): AppConfig {
  let logLevel: LogLevel | undefined;
  if (flags.logLevel !== undefined) {
    if (!isLogLevel(flags.logLevel)) {
      throw new ConfigurationError(`Unknown log level: ${flags.logLevel}`, { logLevel: flags.logLevel });
    }
    logLevel = flags.logLevel;
  }

  return buildEffectiveConfig(
    {
      viesBaseUrl: flags.baseUrl,
      requestTimeoutMs: flags.timeout,
      concurrency: flags.concurrency,
      batchTimeoutMs: flags.batchTimeout,
      logLevel,
    },
    env,
  ).config;
}
