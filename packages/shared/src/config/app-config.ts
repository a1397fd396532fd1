import { z } from 'zod';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Defaults for every setting.
 */
export const DEFAULT_APP_CONFIG = {
  viesBaseUrl: 'https://ec.europa.eu/taxation_customs/vies/rest-api',
  requestTimeoutMs: 15_000,
  retryDelayMs: 500,
  requestIntervalMs: 250,
  concurrency: 5,
  /** 0 disables the overall batch timeout */
  batchTimeoutMs: 0,
  cacheTtlMs: 3_600_000,
  logLevel: 'info',
} as const;

const AppConfigSchema = z.object({
  viesBaseUrl: z.string().url(),
  requestTimeoutMs: z.coerce.number().int().min(100).max(120_000),
  retryDelayMs: z.coerce.number().int().min(0).max(60_000),
  requestIntervalMs: z.coerce.number().int().min(0).max(60_000),
  concurrency: z.coerce.number().int().min(1).max(50),
  batchTimeoutMs: z.coerce.number().int().min(0),
  cacheTtlMs: z.coerce.number().int().min(0),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Explicit overrides, e.g. from command-line flags. Undefined entries are ignored.
 */
export type ConfigOverrides = { [K in keyof AppConfig]?: AppConfig[K] | undefined };

/**
 * Environment variable for each setting.
 */
export const CONFIG_ENV_VARS: Readonly<Record<keyof AppConfig, string>> = {
  viesBaseUrl: 'VIES_BASE_URL',
  requestTimeoutMs: 'VIES_TIMEOUT_MS',
  retryDelayMs: 'VIES_RETRY_DELAY_MS',
  requestIntervalMs: 'VIES_REQUEST_INTERVAL_MS',
  concurrency: 'VIES_CONCURRENCY',
  batchTimeoutMs: 'VIES_BATCH_TIMEOUT_MS',
  cacheTtlMs: 'VIES_CACHE_TTL_MS',
  logLevel: 'LOG_LEVEL',
};

/**
 * Effective configuration result.
 */
export interface EffectiveConfig {
  config: AppConfig;
  /** Sources that contributed to this config */
  sources: ('default' | 'env' | 'overrides')[];
}

/**
 * Build effective configuration by merging, in increasing precedence:
 * 1. Defaults
 * 2. Environment variables (empty values are ignored)
 * 3. Explicit overrides
 *
 * @throws ConfigurationError when a merged value fails validation
 */
export function buildEffectiveConfig(
  overrides: ConfigOverrides = {},
  env: Readonly<Record<string, string | undefined>> = process.env,
): EffectiveConfig {
  const sources: EffectiveConfig['sources'] = ['default'];
  const merged: Record<string, unknown> = { ...DEFAULT_APP_CONFIG };

  let fromEnv = false;
  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable]?.trim();
    if (value !== undefined && value !== '') {
      merged[key] = value;
      fromEnv = true;
    }
  }
  if (fromEnv) sources.push('env');

  let fromOverrides = false;
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
      fromOverrides = true;
    }
  }
  if (fromOverrides) sources.push('overrides');

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  return { config: parsed.data, sources };
}
