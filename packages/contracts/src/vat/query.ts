/**
 * A single VAT number lookup derived from one input row.
 *
 * Instances are frozen on creation.
 */
export interface VatQuery {
  /**
   * Two-letter EU country code, or null when the raw input could not be
   * split into a recognized country and number.
   */
  readonly countryCode: string | null;

  /** Alphanumeric body without the country prefix */
  readonly number: string;

  /** Zero-based index of the source row within the imported table */
  readonly sourceRowIndex: number;

  /** Cell text as it was imported */
  readonly raw: string;
}

/**
 * Full VAT number (country prefix + body) of a query, used for display and
 * as the cache key.
 */
export function fullVatNumber(query: Pick<VatQuery, 'countryCode' | 'number'>): string {
  return `${query.countryCode ?? ''}${query.number}`;
}
