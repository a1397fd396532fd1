/**
 * VAT number formatting.
 *
 * Splits raw user or spreadsheet input into a country prefix and a body.
 * Pure functions: no network calls, no env reading.
 *
 * @module @vies-batch/shared/vat
 */

import type { VatQuery } from '@vies-batch/contracts';
import { FormatError } from '../errors/errors.js';
import { COUNTRY_NAMES, EU_COUNTRY_CODE_SET, type EUCountryCode } from './constants.js';

/**
 * Outcome of {@link formatVatNumber}.
 */
export type VatFormatResult =
  | {
      readonly ok: true;
      readonly countryCode: EUCountryCode;
      readonly number: string;
    }
  | {
      readonly ok: false;
      readonly errorCode: 'INVALID_INPUT';
      /** Normalized input, kept for display */
      readonly normalized: string;
      readonly reason: string;
    };

/**
 * Uppercase and drop every character that is not A-Z or 0-9.
 *
 * @example
 * ```typescript
 * normalizeVatInput(' it 0515-9640.266 ') // 'IT05159640266'
 * ```
 */
export function normalizeVatInput(raw: string): string {
  return raw.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

export function isEUCountryCode(countryCode: string): countryCode is EUCountryCode {
  return EU_COUNTRY_CODE_SET.has(countryCode);
}

export function getCountryName(countryCode: string): string | undefined {
  const upper = countryCode.toUpperCase();
  return isEUCountryCode(upper) ? COUNTRY_NAMES[upper] : undefined;
}

// `IT IT0515…`; a French body may itself start with the key `FR`, so the
// repeat only counts when a separator follows the first prefix.
function repeatsPrefix(raw: string, prefix: string): boolean {
  const match = /^[^A-Z0-9]*([A-Z]{2})[^A-Z0-9]+([A-Z]{2})/.exec(raw.toUpperCase());
  return match !== null && match[1] === prefix && match[2] === prefix;
}

/**
 * Split a raw VAT number into country code and body.
 *
 * The first two characters must be one of the 28 VIES prefixes. A prefix
 * typed twice with a separator (`IT IT0515…`) is stripped once.
 *
 * @example
 * ```typescript
 * formatVatNumber(' IT 0515 9640266 ')
 * // { ok: true, countryCode: 'IT', number: '05159640266' }
 *
 * formatVatNumber('ZZ123456')
 * // { ok: false, errorCode: 'INVALID_INPUT', normalized: 'ZZ123456', reason: 'Unknown EU country prefix: ZZ' }
 * ```
 */
export function formatVatNumber(raw: string): VatFormatResult {
  const normalized = normalizeVatInput(raw);

  if (normalized.length === 0) {
    return invalid(normalized, 'VAT number is empty');
  }

  const prefix = normalized.slice(0, 2);
  if (!isEUCountryCode(prefix)) {
    return invalid(normalized, `Unknown EU country prefix: ${prefix}`);
  }

  let number = normalized.slice(2);
  if (repeatsPrefix(raw, prefix) && number.length > prefix.length) {
    number = number.slice(prefix.length);
  }

  if (number.length === 0) {
    return invalid(normalized, `VAT number has no digits after ${prefix}`);
  }

  return { ok: true, countryCode: prefix, number };
}

/**
 * Build the immutable query for one input row.
 *
 * Rows that fail formatting keep `countryCode: null` and the normalized text
 * as `number`.
 */
export function toVatQuery(raw: string, sourceRowIndex: number): VatQuery {
  const formatted = formatVatNumber(raw);
  const query: VatQuery = formatted.ok
    ? { countryCode: formatted.countryCode, number: formatted.number, sourceRowIndex, raw }
    : { countryCode: null, number: formatted.normalized, sourceRowIndex, raw };
  return Object.freeze(query);
}

/**
 * Format a number for a single lookup, throwing on bad input.
 *
 * @throws FormatError when the input has no recognized prefix or body
 */
export function requireVatNumber(raw: string): { countryCode: EUCountryCode; number: string } {
  const formatted = formatVatNumber(raw);
  if (!formatted.ok) {
    throw new FormatError(formatted.reason, raw);
  }
  return { countryCode: formatted.countryCode, number: formatted.number };
}
