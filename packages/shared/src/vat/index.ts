/**
 * VAT number formatting and EU country data.
 *
 * @module @vies-batch/shared/vat
 *
 * @example
 * ```typescript
 * import { formatVatNumber } from '@vies-batch/shared';
 *
 * const result = formatVatNumber('IT 0515 9640266');
 * if (result.ok) {
 *   console.log(result.countryCode, result.number); // 'IT' '05159640266'
 * }
 * ```
 */

export {
  EU_COUNTRY_CODES,
  EU_COUNTRY_CODE_SET,
  COUNTRY_NAMES,
  type EUCountryCode,
} from './constants.js';

export {
  normalizeVatInput,
  formatVatNumber,
  toVatQuery,
  requireVatNumber,
  isEUCountryCode,
  getCountryName,
  type VatFormatResult,
} from './format.js';

export { createVatResult, invalidInputResult, type VatResultInit } from './result.js';
