import type { VatQuery, VatResult, ViesErrorCode } from '@vies-batch/contracts';

/**
 * Fields of a VatResult besides its query.
 */
export interface VatResultInit {
  isValid: boolean | null;
  errorCode: ViesErrorCode;
  requestTimestamp: string;
  attempts: number;
  fromCache?: boolean;
  companyName?: string | undefined;
  companyAddress?: string | undefined;
  requestDate?: string | undefined;
  message?: string | undefined;
}

/**
 * Build a frozen VatResult, leaving absent optional fields out.
 */
export function createVatResult(query: VatQuery, init: VatResultInit): VatResult {
  const result: {
    -readonly [K in keyof VatResult]: VatResult[K];
  } = {
    query,
    isValid: init.isValid,
    errorCode: init.errorCode,
    requestTimestamp: init.requestTimestamp,
    attempts: init.attempts,
    fromCache: init.fromCache ?? false,
  };
  if (init.companyName !== undefined) {
    result.companyName = init.companyName;
  }
  if (init.companyAddress !== undefined) {
    result.companyAddress = init.companyAddress;
  }
  if (init.requestDate !== undefined) {
    result.requestDate = init.requestDate;
  }
  if (init.message !== undefined) {
    result.message = init.message;
  }
  return Object.freeze(result);
}

/**
 * Local answer for a query that failed formatting. No request is made.
 */
export function invalidInputResult(query: VatQuery, requestTimestamp: string): VatResult {
  const message = query.raw.trim() === ''
    ? 'VAT number is empty'
    : `Not a recognized EU VAT number: ${query.raw}`;
  return createVatResult(query, {
    isValid: null,
    errorCode: 'INVALID_INPUT',
    requestTimestamp,
    attempts: 0,
    message,
  });
}
