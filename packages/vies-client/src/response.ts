import { z } from 'zod';
import { isViesErrorCode, type ViesErrorCode } from '@vies-batch/contracts';

/**
 * VIES placeholder for a field the member state does not disclose.
 */
const UNDISCLOSED = '---';

const optionalString = z.string().nullish().catch(undefined);
const optionalBoolean = z.boolean().nullish().catch(undefined);

/**
 * Fields read from a VIES `check-vat-number` payload. Every field is
 * optional; a field of the wrong type is treated as absent.
 */
const ViesPayloadSchema = z
  .object({
    isValid: optionalBoolean,
    valid: optionalBoolean,
    name: optionalString,
    traderName: optionalString,
    address: optionalString,
    traderAddress: optionalString,
    userError: optionalString,
    requestDate: optionalString,
  })
  .passthrough();

export type ViesPayload = z.infer<typeof ViesPayloadSchema>;

/**
 * A VIES payload reduced to the fields a VatResult carries.
 */
export interface ViesAnswer {
  isValid: boolean | null;
  errorCode: ViesErrorCode;
  companyName?: string;
  companyAddress?: string;
  requestDate?: string;
  /** Raw `userError` when it was not VALID/INVALID */
  userError?: string;
}

export type ViesParseOutcome =
  | { ok: true; answer: ViesAnswer }
  | { ok: false; reason: string };

/**
 * Trimmed text, or undefined for blanks and the `---` placeholder.
 */
export function presentText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  if (trimmed === undefined || trimmed === '' || trimmed === UNDISCLOSED) {
    return undefined;
  }
  return trimmed;
}

/**
 * Parse a 200 response body.
 */
export function parseViesBody(body: string): ViesParseOutcome {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { ok: false, reason: 'Response body is not valid JSON' };
  }
  return normalizeViesPayload(json);
}

/**
 * Normalize a decoded payload.
 *
 * Precedence:
 * - validity: `isValid`, then `valid`, then a VALID/INVALID `userError`
 * - name: `name`, then `traderName`; address: `address`, then `traderAddress`
 *   (first non-empty wins)
 * - any other `userError` becomes the error code verbatim (UNKNOWN when not a
 *   known code) and validity becomes unknown
 *
 * A payload with neither a validity flag nor a `userError` is malformed.
 */
export function normalizeViesPayload(json: unknown): ViesParseOutcome {
  const parsed = ViesPayloadSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: 'Response body is not a JSON object' };
  }
  const payload = parsed.data;

  const flag = payload.isValid ?? payload.valid ?? null;
  const userError = presentText(payload.userError)?.toUpperCase();

  let answer: ViesAnswer;
  if (userError === undefined || userError === 'VALID' || userError === 'INVALID') {
    const isValid = flag ?? (userError === undefined ? null : userError === 'VALID');
    if (isValid === null) {
      return { ok: false, reason: 'Response has neither a validity flag nor a userError' };
    }
    answer = { isValid, errorCode: isValid ? 'VALID' : 'INVALID' };
  } else {
    answer = {
      isValid: null,
      errorCode: isViesErrorCode(userError) ? userError : 'UNKNOWN',
      userError,
    };
  }

  const companyName = presentText(payload.name) ?? presentText(payload.traderName);
  const companyAddress = presentText(payload.address) ?? presentText(payload.traderAddress);
  const requestDate = presentText(payload.requestDate);
  if (companyName !== undefined) answer.companyName = companyName;
  if (companyAddress !== undefined) answer.companyAddress = companyAddress;
  if (requestDate !== undefined) answer.requestDate = requestDate;

  return { ok: true, answer };
}
