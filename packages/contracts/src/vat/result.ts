import type { VatQuery } from './query.js';

/**
 * Outcome codes for a VAT lookup.
 *
 * VALID and INVALID are definitive answers from VIES. INVALID_INPUT is
 * produced locally before any request. The remaining codes are either VIES
 * `userError` values recorded verbatim or transport failures.
 */
export const VIES_ERROR_CODES = [
  'VALID',
  'INVALID',
  'INVALID_INPUT',
  'SERVICE_UNAVAILABLE',
  'MS_UNAVAILABLE',
  'TIMEOUT',
  'GLOBAL_MAX_CONCURRENT_REQ',
  'MS_MAX_CONCURRENT_REQ',
  'UNKNOWN',
] as const;

export type ViesErrorCode = (typeof VIES_ERROR_CODES)[number];

const VIES_ERROR_CODE_SET: ReadonlySet<string> = new Set(VIES_ERROR_CODES);

export function isViesErrorCode(value: string): value is ViesErrorCode {
  return VIES_ERROR_CODE_SET.has(value);
}

/**
 * Whether the code is a definitive answer (the number was checked).
 */
export function isDefinitiveCode(code: ViesErrorCode): boolean {
  return code === 'VALID' || code === 'INVALID';
}

/**
 * Result of validating one VatQuery. Produced exactly once per query and
 * frozen on creation.
 */
export interface VatResult {
  readonly query: VatQuery;

  /** true/false when VIES answered, null when unknown */
  readonly isValid: boolean | null;

  readonly companyName?: string;

  readonly companyAddress?: string;

  readonly errorCode: ViesErrorCode;

  /** ISO timestamp of when the lookup finished */
  readonly requestTimestamp: string;

  /** `requestDate` reported by VIES, when present */
  readonly requestDate?: string;

  /** Number of HTTP attempts made (0 for local or cached answers) */
  readonly attempts: number;

  /** Answer served from the result cache */
  readonly fromCache: boolean;

  /** Human-readable failure detail */
  readonly message?: string;
}
