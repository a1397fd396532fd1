/**
 * @vies-batch/shared
 *
 * Logging, errors, configuration and VAT number formatting.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  noopLogger,
  isLogLevel,
  LOG_LEVEL_NAMES,
  type Logger,
  type LogLevel,
  type LogWriter,
  type LoggerOptions,
} from './logging/logger.js';
export {
  VatCheckError,
  FormatError,
  NetworkError,
  TimeoutError,
  ServiceError,
  WriteError,
  SpreadsheetFormatError,
  ConfigurationError,
  InvalidStateError,
  errorMessage,
} from './errors/errors.js';
export {
  defaultClock,
  defaultIdGenerator,
  generateBatchId,
  fileTimestamp,
  clockTime,
  type Clock,
  type IdGenerator,
} from './utils/ids.js';
export {
  DEFAULT_APP_CONFIG,
  CONFIG_ENV_VARS,
  buildEffectiveConfig,
  type AppConfig,
  type ConfigOverrides,
  type EffectiveConfig,
} from './config/app-config.js';

// VAT number formatting (format and country inference only)
export {
  EU_COUNTRY_CODES,
  EU_COUNTRY_CODE_SET,
  COUNTRY_NAMES,
  type EUCountryCode,
  normalizeVatInput,
  formatVatNumber,
  toVatQuery,
  requireVatNumber,
  isEUCountryCode,
  getCountryName,
  type VatFormatResult,
  createVatResult,
  invalidInputResult,
  type VatResultInit,
} from './vat/index.js';
