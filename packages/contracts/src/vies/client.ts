import type { VatQuery } from '../vat/query.js';
import type { VatResult } from '../vat/result.js';

/**
 * Contract of a VIES lookup client.
 *
 * Implementations never reject: every failure is reported through
 * `VatResult.errorCode`.
 */
export interface ViesClient {
  /**
   * Validate a formatted query.
   */
  validate(query: VatQuery): Promise<VatResult>;

  /**
   * Release resources held by the client.
   */
  close?(): Promise<void>;
}
